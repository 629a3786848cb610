import { INDICATOR_CONFIG, type RsiSignal } from "./schema.js";
import { ewm } from "./series.js";

export interface RsiSeries {
  rsi: (number | null)[];
  signal: (RsiSignal | null)[];
}

/**
 * RSI with Wilder smoothing in exponential form (alpha = 1/period). The first
 * date has no price change and counts as zero gain and zero loss, so both
 * averages start from 0 and the first RSI is undefined (null).
 *
 * loss == 0 with a positive average gain is RSI 100; a series with neither gains
 * nor losses so far has no defined RSI (null).
 */
export function computeRSISeries(
  closes: readonly number[],
  period: number = INDICATOR_CONFIG.rsi.period,
): (number | null)[] {
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 0; i < closes.length; i++) {
    const delta = i === 0 ? 0 : closes[i] - closes[i - 1];
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  }

  const avgGain = ewm(gains, 1 / period);
  const avgLoss = ewm(losses, 1 / period);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === null || loss === null) return null;
    if (loss === 0) return gain > 0 ? 100 : null;
    const rs = gain / loss;
    return 100 - 100 / (1 + rs);
  });
}

/**
 * BUY when RSI climbs back to or above the oversold line, SELL when it falls back
 * to or below the overbought line.
 */
export function detectRSISignals(
  rsi: readonly (number | null)[],
  oversold: number = INDICATOR_CONFIG.rsi.oversold,
  overbought: number = INDICATOR_CONFIG.rsi.overbought,
): (RsiSignal | null)[] {
  return rsi.map((value, t) => {
    if (t === 0) return null;
    const prev = rsi[t - 1];
    if (value === null || prev === null) return null;
    if (value >= oversold && prev < oversold) return "BUY";
    if (value <= overbought && prev > overbought) return "SELL";
    return null;
  });
}

export function computeRSI(closes: readonly number[], period?: number): RsiSeries {
  const rsi = computeRSISeries(closes, period);
  return { rsi, signal: detectRSISignals(rsi) };
}
