/**
 * Daily Indicator Engine
 *
 * Recomputes the full indicator history for one security from its ordered daily
 * closes. Every row is a pure function of the series, so the output can replace
 * whatever was persisted before.
 *
 * - MACD (12/26/9) with histogram zero-line crosses
 * - RSI(14) with 30/70 re-entry signals
 * - SMA 5/20/60/120 with adjacent-window crosses
 */
import { InsufficientHistoryError } from "../shared/errors.js";
import { computeMACD } from "./macd.js";
import { computeMovingAverages } from "./moving-average.js";
import { computeRSI } from "./rsi.js";
import { type ClosePoint, type IndicatorState } from "./schema.js";
import { finiteOrNull } from "./series.js";

/** Longest look-back any indicator needs for a full-window value. */
export const FULL_HISTORY = 120;

function sortByDate(points: readonly ClosePoint[]): ClosePoint[] {
  return [...points].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Indicator rows for every date in `points`. Windows that cannot be completed yet
 * are null, never approximated.
 */
export function computeIndicatorStates(code: string, points: readonly ClosePoint[]): IndicatorState[] {
  const ordered = sortByDate(points);
  const closes = ordered.map((p) => p.close);

  const macd = computeMACD(closes);
  const rsi = computeRSI(closes);
  const ma = computeMovingAverages(closes);

  return ordered.map((p, i) => ({
    code,
    date: p.date,
    macd: finiteOrNull(macd.macd[i]),
    macd_signal: finiteOrNull(macd.signal[i]),
    macd_hist: finiteOrNull(macd.histogram[i]),
    macd_cross: macd.cross[i],
    rsi: finiteOrNull(rsi.rsi[i]),
    rsi_signal: rsi.signal[i],
    ma5: finiteOrNull(ma.averages[5][i]),
    ma20: finiteOrNull(ma.averages[20][i]),
    ma60: finiteOrNull(ma.averages[60][i]),
    ma120: finiteOrNull(ma.averages[120][i]),
    cross_5_20: ma.cross_5_20[i],
    cross_20_60: ma.cross_20_60[i],
    cross_60_120: ma.cross_60_120[i],
  }));
}

/**
 * Batch entry point: refuses series shorter than `minHistory` so the caller can
 * skip and log the security instead of persisting a mostly-null history.
 */
export function computeIndicatorsForSecurity(
  code: string,
  points: readonly ClosePoint[],
  minHistory: number = FULL_HISTORY,
): IndicatorState[] {
  if (points.length < minHistory) {
    throw new InsufficientHistoryError(minHistory, points.length, code);
  }
  return computeIndicatorStates(code, points);
}
