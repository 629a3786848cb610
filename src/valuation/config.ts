import type { ValuationConfig } from "./types.js";

/**
 * Performance-surprise labels as they appear in consensus snapshots
 * (상회 = beat, 하회 = miss, 유지 = in line), plus English aliases.
 */
export const PERFORMANCE_ADJUSTMENTS: Readonly<Record<string, number>> = {
  "상회": 1.1,
  "하회": 0.9,
  "유지": 1.0,
  "컨센상회": 1.1,
  "컨센하회": 0.9,
  beat: 1.1,
  miss: 0.9,
  "in-line": 1.0,
};

export const DEFAULT_VALUATION_CONFIG: ValuationConfig = {
  requiredRoe: 8.0,
  weights: { rim: 0.6, industryPer: 0.2, pegr: 0.2 },
  haircut: 0.8,
  pegrMinGrowth: 5,
  pegrMaxGrowth: 50,
  lowThreshold: -10,
  highThreshold: 10,
  performanceAdjustments: PERFORMANCE_ADJUSTMENTS,
};

/** Overlay partial settings (e.g. from the process config) on the defaults. */
export function buildValuationConfig(
  overrides: Partial<Omit<ValuationConfig, "weights">> & { weights?: Partial<ValuationConfig["weights"]> } = {},
): ValuationConfig {
  return {
    ...DEFAULT_VALUATION_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_VALUATION_CONFIG.weights, ...overrides.weights },
    performanceAdjustments: overrides.performanceAdjustments ?? DEFAULT_VALUATION_CONFIG.performanceAdjustments,
  };
}
