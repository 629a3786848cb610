import type { MarketRepository } from "../db/repository.js";
import { logRisk } from "../logging.js";
import { computeRiskMetrics } from "../risk/drawdown.js";
import { addDays } from "../shared/dates.js";
import { CoreError, errorMessage } from "../shared/errors.js";
import { emptySummary, type StepSummary } from "./types.js";

export interface RiskUpdateOptions {
  /** Snapshot date the metrics are written to */
  date: string;
  /** Trailing window, calendar days */
  windowDays: number;
  limit: number | null;
}

/**
 * Compute drawdown metrics over the trailing window ending at `date` and store
 * them on that date's fundamental snapshot. Only securities with a snapshot on
 * `date` are targeted.
 */
export function updateRiskMetrics(repo: MarketRepository, opts: RiskUpdateOptions): StepSummary {
  let codes = repo.listFundamentalCodes(opts.date);
  if (opts.limit != null && opts.limit > 0) codes = codes.slice(0, opts.limit);
  const summary = emptySummary("risk", codes.length);
  const since = addDays(opts.date, -opts.windowDays);

  for (const code of codes) {
    try {
      const bars = repo.getPriceSeries(code, since).filter((b) => b.date <= opts.date);
      const metrics = computeRiskMetrics(bars);
      repo.updateRiskFields(code, opts.date, metrics);
      summary.processed++;
    } catch (e) {
      if (e instanceof CoreError) {
        summary.skipped.push({ code, reason: e.code });
        logRisk.debug({ code, reason: e.message }, "Risk metrics skipped");
      } else {
        summary.failed.push({ code, reason: errorMessage(e) });
        logRisk.error({ code, err: errorMessage(e) }, "Risk computation failed");
      }
    }
  }
  return summary;
}
