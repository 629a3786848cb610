import type { MarketRepository } from "../db/repository.js";
import { computeIndicatorsForSecurity } from "../indicators/engine.js";
import { logIndicators } from "../logging.js";
import { CoreError, errorMessage } from "../shared/errors.js";
import { emptySummary, type StepSummary } from "./types.js";

export interface IndicatorUpdateOptions {
  minHistory: number;
  limit: number | null;
}

/**
 * Rebuild every security's indicator history from its stored closes. Short
 * histories are skipped; the stored rows of a skipped security are left alone.
 */
export function updateIndicators(repo: MarketRepository, opts: IndicatorUpdateOptions): StepSummary {
  const securities = repo.listSecurities({ limit: opts.limit });
  const summary = emptySummary("indicators", securities.length);
  let rows = 0;

  for (const sec of securities) {
    try {
      const points = repo.getPriceSeries(sec.code).map((b) => ({ date: b.date, close: b.close }));
      const states = computeIndicatorsForSecurity(sec.code, points, opts.minHistory);
      rows += repo.replaceIndicatorStates(sec.code, states);
      summary.processed++;
    } catch (e) {
      if (e instanceof CoreError) {
        summary.skipped.push({ code: sec.code, reason: e.code });
        logIndicators.debug({ code: sec.code, reason: e.message }, "Indicators skipped");
      } else {
        summary.failed.push({ code: sec.code, reason: errorMessage(e) });
        logIndicators.error({ code: sec.code, err: errorMessage(e) }, "Indicator computation failed");
      }
    }
  }

  logIndicators.info({ rows, processed: summary.processed }, `Indicators: ${rows} rows written`);
  return summary;
}
