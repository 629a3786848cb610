import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { logRest, requestLogger } from "../logging.js";
import { getSchedulerState } from "../scheduler.js";
import { createRouter, type RouteDeps } from "./routes.js";

export interface AppDeps extends RouteDeps {
  /** Empty string disables the key check */
  apiKey: string;
  /** Requests per minute per key on /api */
  rateLimitPerMinute?: number;
}

function headerValue(req: Request, name: string): string | undefined {
  const v = req.headers[name];
  return typeof v === "string" ? v : undefined;
}

function apiKeyAuth(key: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const provided = headerValue(req, "x-api-key") ?? req.headers.authorization?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(key);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

const startTime = Date.now();

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Rate limiter keyed by API key, not IP
  const limiter = rateLimit({
    windowMs: 60_000,
    limit: deps.rateLimitPerMinute ?? 100,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request): string => headerValue(req, "x-api-key") ?? "anonymous",
    message: { error: "Rate limit exceeded" },
    validate: { ip: false },
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      latest_trade_date: deps.repo.getLatestMarketDate(),
      latest_valuation_date: deps.repo.getLatestValuationDate(),
      scheduler: getSchedulerState(),
    });
  });

  app.use("/api", apiKeyAuth(deps.apiKey), limiter, createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}

export function startRestServer(deps: AppDeps, port: number): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(deps);
    const httpServer = app.listen(port, () => {
      logRest.info({ port }, "REST server listening");
      if (deps.apiKey) logRest.info("API key authentication enabled");
      resolve(httpServer);
    });
  });
}
