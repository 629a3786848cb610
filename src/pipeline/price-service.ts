import type { MarketRepository } from "../db/repository.js";
import { validatePriceBars } from "../ingest/validation.js";
import { logIngest } from "../logging.js";
import { type DailyBarsResult, fetchDailyBars } from "../providers/yahoo.js";
import { addDays } from "../shared/dates.js";
import { errorMessage } from "../shared/errors.js";
import { emptySummary, type StepSummary } from "./types.js";

export type PriceFetcher = (code: string, market: string, since: string) => Promise<DailyBarsResult>;

export interface PriceUpdateOptions {
  /** Run date, YYYY-MM-DD */
  today: string;
  /** First date for a security with no stored bars; null = one year before today */
  startDate: string | null;
  limit: number | null;
}

/** Where an incremental fetch resumes: the day after the last stored bar. */
export function resumeDate(lastStored: string | null, opts: Pick<PriceUpdateOptions, "today" | "startDate">): string {
  if (lastStored !== null) return addDays(lastStored, 1);
  return opts.startDate ?? addDays(opts.today, -365);
}

/**
 * Incrementally fetch and store daily bars for the registry. Bars failing the
 * OHLC invariants are rejected and counted; one security's failure never stops
 * the batch.
 */
export async function updatePrices(
  repo: MarketRepository,
  opts: PriceUpdateOptions,
  fetcher: PriceFetcher = fetchDailyBars,
): Promise<StepSummary> {
  const securities = repo.listSecurities({ limit: opts.limit });
  const summary = emptySummary("prices", securities.length);
  let stored = 0;
  let rejected = 0;

  for (const sec of securities) {
    const since = resumeDate(repo.getLatestTradeDate(sec.code), opts);
    if (since > opts.today) {
      summary.skipped.push({ code: sec.code, reason: "up-to-date" });
      continue;
    }

    try {
      const fetched = await fetcher(sec.code, sec.market, since);
      if (fetched.symbol === null) {
        summary.skipped.push({ code: sec.code, reason: "not-found" });
        continue;
      }

      const { valid, rejected: bad } = validatePriceBars(fetched.bars.map((b) => ({ ...b, code: sec.code })));
      for (const r of bad) {
        logIngest.warn({ code: sec.code, date: fetched.bars[r.index]?.date, reason: r.reason }, "Rejected price bar");
      }
      rejected += bad.length;
      stored += valid.length > 0 ? repo.upsertPriceBars(valid) : 0;
      summary.processed++;
    } catch (e) {
      summary.failed.push({ code: sec.code, reason: errorMessage(e) });
      logIngest.error({ code: sec.code, err: errorMessage(e) }, "Price update failed");
    }
  }

  logIngest.info({ stored, rejected, processed: summary.processed }, `Price update: ${stored} bars stored, ${rejected} rejected`);
  return summary;
}
