/**
 * Indicator State Schema: the per-security, per-date row the indicator engine
 * produces and the screening queries read.
 *
 * The rows are a materialized cache: every value is recomputable from the price
 * series, so the table may be dropped and rebuilt at any time.
 */

export type CrossLabel = "GOLDEN" | "DEAD";
export type RsiSignal = "BUY" | "SELL";

export interface ClosePoint {
  /** Trading date, YYYY-MM-DD */
  date: string;
  close: number;
}

export interface IndicatorState {
  code: string;
  date: string;

  // ── MACD ──
  macd: number | null;
  macd_signal: number | null;
  macd_hist: number | null;
  macd_cross: CrossLabel | null;

  // ── RSI ──
  rsi: number | null;
  rsi_signal: RsiSignal | null;

  // ── Moving averages ──
  ma5: number | null;
  ma20: number | null;
  ma60: number | null;
  ma120: number | null;
  cross_5_20: CrossLabel | null;
  cross_20_60: CrossLabel | null;
  cross_60_120: CrossLabel | null;
}

export const INDICATOR_CONFIG = {
  macd: { fast: 12, slow: 26, signal: 9 },
  rsi: { period: 14, oversold: 30, overbought: 70 },
  movingAverages: [5, 20, 60, 120] as const,
} as const;

export type MovingAverageWindow = (typeof INDICATOR_CONFIG.movingAverages)[number];
