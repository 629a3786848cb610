import { ArithmeticDegenerateError, InsufficientHistoryError } from "../shared/errors.js";

export interface RiskBar {
  date: string;
  close: number;
  high: number;
  low: number;
}

export interface DrawdownMetrics {
  /** Worst (most negative) low-vs-running-peak drawdown, % */
  max_drawdown: number;
  /** Mean close-vs-running-peak drawdown, % */
  avg_drawdown: number;
}

export interface DownsideProfile {
  /** Most negative day-over-day close return, % (negative or 0) */
  worst_daily_drop: number;
  /** Mean of the negative daily returns, %; null when no day closed lower */
  avg_downside: number | null;
  /** Share of days that closed lower than the previous day, % */
  down_probability: number;
}

export interface RiskMetrics extends DrawdownMetrics, DownsideProfile {
  /** Legacy "max 1-day fall rate": min daily return clamped to 0 when nothing fell */
  max_daily_fall_rate: number;
  sample_size: number;
}

const round2 = (v: number): number => Math.round(v * 100) / 100;

/**
 * Peak-to-trough drawdowns against the running maximum of the highs.
 * The peak always includes the current bar's high, so a non-positive result is
 * guaranteed for valid bars (low <= high).
 */
export function computeDrawdowns(bars: readonly RiskBar[]): DrawdownMetrics {
  if (bars.length < 2) throw new InsufficientHistoryError(2, bars.length);

  let runningMax = -Infinity;
  let maxDrawdown = Infinity;
  let closeDrawdownSum = 0;
  let counted = 0;

  for (const bar of bars) {
    runningMax = Math.max(runningMax, bar.high);
    if (!(runningMax > 0)) continue;
    const lowDd = ((bar.low - runningMax) / runningMax) * 100;
    const closeDd = ((bar.close - runningMax) / runningMax) * 100;
    maxDrawdown = Math.min(maxDrawdown, lowDd);
    closeDrawdownSum += closeDd;
    counted++;
  }

  if (counted === 0) throw new ArithmeticDegenerateError("No positive running peak to measure drawdowns against");

  return {
    max_drawdown: round2(maxDrawdown),
    avg_drawdown: round2(closeDrawdownSum / counted),
  };
}

/** Day-over-day percentage returns; days after a non-positive close are skipped. */
export function dailyReturns(closes: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    if (!(prev > 0)) continue;
    out.push(((closes[i] - prev) / prev) * 100);
  }
  return out;
}

/**
 * Largest single-day fall. A series that never closed lower reports exactly 0,
 * not the smallest gain.
 */
export function computeMaxDailyFallRate(closes: readonly number[]): number {
  if (closes.length < 2) throw new InsufficientHistoryError(2, closes.length);
  const returns = dailyReturns(closes);
  if (returns.length === 0) return 0;
  const min = Math.min(...returns);
  return min >= 0 ? 0 : round2(min);
}

export function computeDownsideProfile(closes: readonly number[]): DownsideProfile {
  if (closes.length < 2) throw new InsufficientHistoryError(2, closes.length);
  const returns = dailyReturns(closes);
  if (returns.length === 0) {
    return { worst_daily_drop: 0, avg_downside: null, down_probability: 0 };
  }
  const negatives = returns.filter((r) => r < 0);
  return {
    worst_daily_drop: round2(Math.min(...returns)),
    avg_downside: negatives.length > 0 ? round2(negatives.reduce((s, r) => s + r, 0) / negatives.length) : null,
    down_probability: round2((negatives.length / returns.length) * 100),
  };
}

/** All risk fields for one security's trailing window. Bars must be date-ascending. */
export function computeRiskMetrics(bars: readonly RiskBar[]): RiskMetrics {
  const closes = bars.map((b) => b.close);
  return {
    ...computeDrawdowns(bars),
    ...computeDownsideProfile(closes),
    max_daily_fall_rate: computeMaxDailyFallRate(closes),
    sample_size: bars.length,
  };
}
