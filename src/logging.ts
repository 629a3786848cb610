import pino from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = process.env.LOG_DIR ?? path.join(__dirname, "../data/logs");
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

// Rotate log file daily; filename: krx-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `krx-${date}.log`);
}

// Multi-destination: stderr (human-readable) + file (JSON for parsing).
// Tests log synchronously to stderr at LOG_LEVEL (silent under vitest.config.ts).
function buildLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL ?? "info";
  if (isTest) {
    return pino({ level, base: { service: "krx-screener" } }, pino.destination(2));
  }

  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level,
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug", // file gets everything
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level; targets filter individually
      base: { service: "krx-screener" },
    },
    transport,
  );
}

export const logger = buildLogger();

// Typed child loggers for subsystems
export const logIndicators = logger.child({ subsystem: "indicators" });
export const logRisk = logger.child({ subsystem: "risk" });
export const logValuation = logger.child({ subsystem: "valuation" });
export const logScreening = logger.child({ subsystem: "screening" });
export const logIngest = logger.child({ subsystem: "ingest" });
export const logDb = logger.child({ subsystem: "database" });
export const logPipeline = logger.child({ subsystem: "pipeline" });
export const logRest = logger.child({ subsystem: "rest" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30) {
  try {
    if (!fs.existsSync(logsDir)) return;
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("krx-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/krx-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
