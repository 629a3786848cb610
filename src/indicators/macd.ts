import { INDICATOR_CONFIG, type CrossLabel } from "./schema.js";
import { detectZeroCrosses, ema, subtract } from "./series.js";

export interface MacdSeries {
  macd: (number | null)[];
  signal: (number | null)[];
  histogram: (number | null)[];
  cross: (CrossLabel | null)[];
}

/**
 * MACD over daily closes: EMA(fast) - EMA(slow), its EMA(signal) and the
 * histogram between them. Crosses are read off the histogram's zero line.
 */
export function computeMACD(
  closes: readonly number[],
  fast: number = INDICATOR_CONFIG.macd.fast,
  slow: number = INDICATOR_CONFIG.macd.slow,
  signalSpan: number = INDICATOR_CONFIG.macd.signal,
): MacdSeries {
  const macd = subtract(ema(closes, fast), ema(closes, slow));
  const signal = ema(macd, signalSpan);
  const histogram = subtract(macd, signal);
  return { macd, signal, histogram, cross: detectZeroCrosses(histogram) };
}
