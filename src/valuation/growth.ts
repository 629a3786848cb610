import type { GrowthRates, ValuationInput } from "./types.js";

/**
 * Percentage change from a trailing to a forward figure. A missing forward value,
 * or a trailing value that is missing, zero or negative, gives 0: the ratio would
 * be undefined or flip sign meaninglessly.
 */
export function growthRate(trailing: number | null, forward: number | null): number {
  if (trailing === null || forward === null) return 0;
  if (!(trailing > 0) || !Number.isFinite(forward)) return 0;
  return ((forward - trailing) / trailing) * 100;
}

export function computeGrowthRates(input: ValuationInput): GrowthRates {
  return {
    eps: growthRate(input.eps, input.epsPred),
    bps: growthRate(input.bps, input.bpsPred),
    roe: growthRate(input.roe, input.roePred),
  };
}
