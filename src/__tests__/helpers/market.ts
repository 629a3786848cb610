// Shared fixtures for tests that need a populated market store
import { openDatabase } from "../../db/database.js";
import { MarketRepository, type PriceBarRow } from "../../db/repository.js";
import type { IndicatorState } from "../../indicators/schema.js";
import { addDays } from "../../shared/dates.js";
import type { ValuationResult } from "../../valuation/types.js";

export function memoryRepo(): MarketRepository {
  return new MarketRepository(openDatabase(":memory:"));
}

/** One bar per calendar day from `start`, high/low one won either side of the close. */
export function makeBars(code: string, closes: readonly number[], start = "2024-01-01"): PriceBarRow[] {
  return closes.map((close, i) => ({
    code,
    date: addDays(start, i),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
  }));
}

export function makeState(code: string, date: string, overrides: Partial<IndicatorState> = {}): IndicatorState {
  return {
    code,
    date,
    macd: null,
    macd_signal: null,
    macd_hist: null,
    macd_cross: null,
    rsi: null,
    rsi_signal: null,
    ma5: null,
    ma20: null,
    ma60: null,
    ma120: null,
    cross_5_20: null,
    cross_20_60: null,
    cross_60_120: null,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ValuationResult> = {}): ValuationResult {
  return {
    code: "005930",
    name: null,
    date: "2024-06-28",
    fair_value: 1000,
    current_price: 800,
    discrepancy_ratio: -20,
    eps_growth_rate: 10,
    bps_growth_rate: 5,
    roe_growth_rate: 0,
    peg_ratio: null,
    result: "UNDERVALUED",
    base_fair_value: 1000,
    rim_value: 1250,
    per_value: null,
    pegr_value: null,
    perf_adj_factor: 1,
    perf_yoy: null,
    perf_vs_3m_ago: null,
    perf_vs_consensus: null,
    ...overrides,
  };
}
