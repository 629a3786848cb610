import fs from "fs";
import type { AppConfig } from "../config.js";
import type { MarketRepository } from "../db/repository.js";
import { importFundamentalsFromFile } from "../ingest/fundamentals-importer.js";
import { importListingsFromFile } from "../ingest/listing-importer.js";
import { logPipeline } from "../logging.js";
import {
  COINCIDENCE_COLUMNS,
  exportReport,
  exportValuationReport,
  SUSTAINED_TREND_COLUMNS,
} from "../reports/export.js";
import { Screener } from "../screening/screener.js";
import { toSeoulDate } from "../shared/dates.js";
import { buildValuationConfig } from "../valuation/config.js";
import { ValuationEngine } from "../valuation/engine.js";
import { updateIndicators } from "./indicator-service.js";
import { type PriceFetcher, updatePrices } from "./price-service.js";
import { updateRiskMetrics } from "./risk-service.js";
import { PIPELINE_STEPS, type PipelineStep, type StepSummary } from "./types.js";
import { updateValuations } from "./valuation-service.js";

export interface PipelineOptions {
  steps?: readonly PipelineStep[];
  /** Run date; defaults to today in Asia/Seoul */
  today?: string;
  /** Injected for tests; defaults to Yahoo Finance */
  fetcher?: PriceFetcher;
}

export interface PipelineRun {
  today: string;
  /** Snapshot date the risk, valuation and report steps worked on */
  evaluationDate: string | null;
  steps: StepSummary[];
  reportPath: string | null;
  /** Screen exports written by the report step */
  screenReportPaths: string[];
}

export function parseSteps(raw: string): PipelineStep[] {
  const requested = raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
  const unknown = requested.filter((s) => !PIPELINE_STEPS.some((p) => p === s));
  if (unknown.length > 0) {
    throw new Error(`Unknown pipeline step(s): ${unknown.join(", ")}. Valid: ${PIPELINE_STEPS.join(", ")}`);
  }
  // Canonical order regardless of how they were listed
  return PIPELINE_STEPS.filter((p) => requested.includes(p));
}

/** Listing and fundamentals CSVs named in the config, loaded ahead of the price fetch. */
function importConfiguredFiles(repo: MarketRepository, cfg: AppConfig, today: string): void {
  const present = (file: string): boolean => {
    if (!file) return false;
    if (fs.existsSync(file)) return true;
    logPipeline.warn({ file }, "Configured CSV not found; import skipped");
    return false;
  };
  if (present(cfg.ingest.listingCsvPath)) {
    importListingsFromFile(repo, cfg.ingest.listingCsvPath);
  }
  if (present(cfg.ingest.fundamentalsCsvPath)) {
    importFundamentalsFromFile(repo, cfg.ingest.fundamentalsCsvPath, {
      date: today,
      requirePositiveEarnings: cfg.ingest.requirePositiveEarnings,
    });
  }
}

/** Signal screens over the configured window, one workbook each; empty screens write nothing. */
async function exportScreens(repo: MarketRepository, cfg: AppConfig, today: string): Promise<string[]> {
  const screener = new Screener(repo);
  const days = cfg.screening.lookbackDays;
  const written = [
    await exportReport("macd_rsi", today, screener.findMacdRsiCoincidence(days), COINCIDENCE_COLUMNS, cfg.reports.dir),
    await exportReport("golden_cross", today, screener.findSustainedTrend({ days }), SUSTAINED_TREND_COLUMNS, cfg.reports.dir),
  ];
  return written.filter((p): p is string => p !== null);
}

function logStep(summary: StepSummary): void {
  const skipped = summary.skipped.length + summary.failed.length;
  logPipeline.info(
    {
      step: summary.step,
      total: summary.total,
      processed: summary.processed,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
    },
    `${summary.step}: ${skipped} of ${summary.total} securities skipped`,
  );
}

/**
 * Run the daily batch: prices → indicators → risk → valuation → report.
 * Each step isolates per-security failures; a step that throws aborts the run.
 */
export async function runPipeline(
  repo: MarketRepository,
  cfg: AppConfig,
  opts: PipelineOptions = {},
): Promise<PipelineRun> {
  const steps = new Set(opts.steps ?? PIPELINE_STEPS);
  const today = opts.today ?? toSeoulDate(new Date());
  const started = Date.now();
  const run: PipelineRun = { today, evaluationDate: null, steps: [], reportPath: null, screenReportPaths: [] };
  const record = (s: StepSummary) => {
    run.steps.push(s);
    logStep(s);
  };

  logPipeline.info({ today, steps: [...steps] }, "Pipeline started");

  if (steps.has("prices")) {
    importConfiguredFiles(repo, cfg, today);
    record(
      await updatePrices(
        repo,
        { today, startDate: cfg.ingest.priceStartDate, limit: cfg.ingest.limit },
        opts.fetcher,
      ),
    );
  }

  if (steps.has("indicators")) {
    record(updateIndicators(repo, { minHistory: cfg.indicators.minHistory, limit: cfg.ingest.limit }));
  }

  // Fundamentals arrive as dated snapshots; the newest one is what we value
  run.evaluationDate = repo.getLatestFundamentalDate();

  if (steps.has("risk")) {
    if (run.evaluationDate === null) {
      logPipeline.warn("No fundamental snapshot stored; risk step skipped");
    } else {
      record(
        updateRiskMetrics(repo, {
          date: run.evaluationDate,
          windowDays: cfg.risk.windowDays,
          limit: cfg.ingest.limit,
        }),
      );
    }
  }

  if (steps.has("valuation")) {
    if (run.evaluationDate === null) {
      logPipeline.warn("No fundamental snapshot stored; valuation step skipped");
    } else {
      const engine = new ValuationEngine(buildValuationConfig(cfg.valuation));
      record(updateValuations(repo, engine, { date: run.evaluationDate, limit: cfg.ingest.limit }).summary);
    }
  }

  if (steps.has("report")) {
    const date = repo.getLatestValuationDate();
    if (date !== null) {
      run.reportPath = await exportValuationReport(repo.getValuations({ date }), date, cfg.reports.dir);
    } else {
      logPipeline.info("No valuations stored; valuation report skipped");
    }
    run.screenReportPaths = await exportScreens(repo, cfg, today);
  }

  logPipeline.info({ duration_ms: Date.now() - started, reportPath: run.reportPath }, "Pipeline finished");
  return run;
}
