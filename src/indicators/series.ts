import type { CrossLabel } from "./schema.js";

/**
 * Exponentially weighted mean with smoothing factor `alpha`, seeded by the first
 * value (no warm-up window): out[0] = x[0], out[t] = alpha * x[t] + (1 - alpha) * out[t-1].
 * Null inputs before the first number stay null; a null after it carries the
 * previous average forward.
 */
export function ewm(values: readonly (number | null)[], alpha: number): (number | null)[] {
  const out: (number | null)[] = [];
  let prev: number | null = null;
  for (const v of values) {
    if (v === null || !Number.isFinite(v)) {
      out.push(prev);
      continue;
    }
    prev = prev === null ? v : alpha * v + (1 - alpha) * prev;
    out.push(prev);
  }
  return out;
}

/** EMA over a span N, alpha = 2 / (N + 1). */
export function ema(values: readonly (number | null)[], span: number): (number | null)[] {
  return ewm(values, 2 / (span + 1));
}

/**
 * Simple rolling mean. Null until `window` samples have accumulated.
 */
export function rollingMean(values: readonly number[], window: number): (number | null)[] {
  return values.map((_, i) => {
    if (window <= 0 || i < window - 1) return null;
    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) sum += values[j];
    return sum / window;
  });
}

/** Element-wise a - b; null where either side is null. */
export function subtract(a: readonly (number | null)[], b: readonly (number | null)[]): (number | null)[] {
  return a.map((x, i) => {
    const y = b[i];
    return x === null || y === null ? null : x - y;
  });
}

/**
 * Golden/dead cross of `fast` against `slow`:
 * GOLDEN when fast[t] >= slow[t] and fast[t-1] < slow[t-1];
 * DEAD when fast[t] <= slow[t] and fast[t-1] > slow[t-1].
 * Ties count toward the >= / <= side. Index 0 and any null operand yield null.
 */
export function detectCrosses(
  fast: readonly (number | null)[],
  slow: readonly (number | null)[],
): (CrossLabel | null)[] {
  return fast.map((f, t) => {
    if (t === 0) return null;
    const s = slow[t];
    const fPrev = fast[t - 1];
    const sPrev = slow[t - 1];
    if (f === null || s === null || fPrev === null || sPrev === null) return null;
    if (f >= s && fPrev < sPrev) return "GOLDEN";
    if (f <= s && fPrev > sPrev) return "DEAD";
    return null;
  });
}

/** Zero-line crosses of a single series (e.g. the MACD histogram). */
export function detectZeroCrosses(values: readonly (number | null)[]): (CrossLabel | null)[] {
  return detectCrosses(values, values.map(() => 0));
}

/** NaN and ±Infinity become null so nothing non-finite reaches storage. */
export function finiteOrNull(v: number | null | undefined): number | null {
  return v === null || v === undefined || !Number.isFinite(v) ? null : v;
}
