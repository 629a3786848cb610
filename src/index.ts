#!/usr/bin/env node
import type { Server } from "node:http";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { closeDb, getDb } from "./db/database.js";
import { MarketRepository } from "./db/repository.js";
import { logger, pruneOldLogs } from "./logging.js";
import { parseSteps, runPipeline } from "./pipeline/runner.js";
import { PIPELINE_STEPS, type PipelineStep } from "./pipeline/types.js";
import { startRestServer } from "./rest/server.js";
import { runExclusive, startScheduler, stopScheduler } from "./scheduler.js";
import { Screener } from "./screening/screener.js";
import { buildValuationConfig } from "./valuation/config.js";
import { ValuationEngine } from "./valuation/engine.js";

type Mode = "run" | "serve" | "both";

function argValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  return idx !== -1 ? process.argv[idx + 1] : undefined;
}

function parseMode(raw: string | undefined): Mode {
  const val = raw?.toLowerCase();
  if (val === "run" || val === "serve" || val === "both") return val;
  return "run";
}

async function main() {
  const mode = parseMode(argValue("--mode"));
  const stepsArg = argValue("--steps");
  const steps: PipelineStep[] = stepsArg ? parseSteps(stepsArg) : [...PIPELINE_STEPS];

  logger.info({ mode, steps }, "KRX value screener starting");

  const validation = validateConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) logger.error(error);
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();

  const repo = new MarketRepository(getDb());
  const runOnce = (only: readonly PipelineStep[] = steps) => runExclusive(() => runPipeline(repo, config, { steps: only }));

  let server: Server | null = null;

  const shutdown = async () => {
    logger.info("Shutting down...");
    stopScheduler();
    if (server) {
      const s = server;
      await new Promise<void>((resolve) => s.close(() => resolve()));
    }
    closeDb();
  };

  if (mode === "run") {
    await runOnce();
    await shutdown();
    return;
  }

  if (mode === "both") {
    // Catch up immediately, then keep serving
    await runOnce();
  }

  server = await startRestServer(
    {
      repo,
      screener: new Screener(repo),
      engine: new ValuationEngine(buildValuationConfig(config.valuation)),
      runPipeline: (only) => runOnce(only),
      lookbackDays: config.screening.lookbackDays,
      apiKey: config.rest.apiKey,
    },
    config.rest.port,
  );

  if (config.scheduler.enabled) {
    startScheduler(() => runPipeline(repo, config, { steps }), config.scheduler.runAt);
  }

  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((e) => {
        logger.error({ err: e }, "Shutdown error");
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
