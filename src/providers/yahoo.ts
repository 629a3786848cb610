import YahooFinance from "yahoo-finance2";
import { logIngest } from "../logging.js";
import { toSeoulDate } from "../shared/dates.js";
import { errorMessage } from "../shared/errors.js";
import { lookupWithFallback } from "../shared/fallback.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

// ─── Retry / Timeout ─────────────────────────────────────────

const TIMEOUT_MS = 8000;
const MAX_RETRIES = 2;

async function withTimeout<T>(promise: Promise<T>, ms: number = TIMEOUT_MS): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Yahoo request timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Yahoo reports unknown or delisted symbols through the error message. */
export function isNotFoundError(e: unknown): boolean {
  const msg = errorMessage(e).toLowerCase();
  return msg.includes("not found") || msg.includes("no data") || msg.includes("delisted") || msg.includes("invalid");
}

async function yahooCall<T>(fn: () => Promise<T>, retryDelayMs: number = 500): Promise<T> {
  let lastErr: unknown = new Error("Yahoo request failed");
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await withTimeout(fn());
    } catch (e) {
      lastErr = e;
      // Don't retry on client errors (bad symbol, invalid params)
      if (isNotFoundError(e)) throw e;
      if (attempt < MAX_RETRIES) {
        const delay = (attempt + 1) * retryDelayMs;
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }
  throw lastErr;
}

// ─── Symbols ──────────────────────────────────────────────────

const SUFFIX_BY_MARKET: Record<string, string> = { KOSPI: ".KS", KOSDAQ: ".KQ" };

/** `<code>.KQ` for KOSDAQ, `<code>.KS` for everything else. */
export function yahooSymbol(code: string, market: string): string {
  const suffix = Object.hasOwn(SUFFIX_BY_MARKET, market.toUpperCase()) ? SUFFIX_BY_MARKET[market.toUpperCase()] : ".KS";
  return `${code}${suffix}`;
}

/** The same code on the other board: .KS ↔ .KQ. */
export function alternateSymbol(symbol: string): string | null {
  if (symbol.endsWith(".KS")) return `${symbol.slice(0, -3)}.KQ`;
  if (symbol.endsWith(".KQ")) return `${symbol.slice(0, -3)}.KS`;
  return null;
}

// ─── Daily bars ───────────────────────────────────────────────

export interface DailyBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface DailyBarsResult {
  /** Symbol that answered, or null when neither board knows the code */
  symbol: string | null;
  bars: DailyBar[];
  usedFallback: boolean;
}

async function chartBars(symbol: string, since: string, until: Date): Promise<DailyBar[] | null> {
  try {
    const chart = await yahooCall(() =>
      yf.chart(symbol, {
        period1: since,
        period2: until,
        interval: "1d",
      }),
    );
    const bars: DailyBar[] = [];
    for (const q of chart.quotes ?? []) {
      if (q.open == null || q.high == null || q.low == null || q.close == null) continue;
      bars.push({
        date: toSeoulDate(q.date),
        open: q.open,
        high: q.high,
        low: q.low,
        close: q.close,
        volume: q.volume ?? 0,
      });
    }
    return bars;
  } catch (e) {
    if (isNotFoundError(e)) return null;
    throw e;
  }
}

/**
 * Daily bars for one security from `since` (inclusive) up to `until`. Looks up
 * the board the registry names first and the other board once if that misses.
 */
export async function fetchDailyBars(
  code: string,
  market: string,
  since: string,
  until: Date = new Date(),
): Promise<DailyBarsResult> {
  const primary = yahooSymbol(code, market);
  const hit = await lookupWithFallback(primary, alternateSymbol, (symbol) => chartBars(symbol, since, until));
  if (hit === null) {
    logIngest.warn({ code, market, symbol: primary }, "No price data on either board");
    return { symbol: null, bars: [], usedFallback: false };
  }
  if (hit.usedFallback) {
    logIngest.info({ code, market, symbol: hit.key }, "Prices found on the other board");
  }
  return { symbol: hit.key, bars: hit.value, usedFallback: hit.usedFallback };
}
