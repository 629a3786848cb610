export type ValuationClass = "UNDERVALUED" | "OVERVALUED" | "FAIR";

export type SubModelId = "rim" | "industryPer" | "pegr";

/**
 * One security's flattened valuation input: the fundamental snapshot of the
 * evaluation date joined with the latest close. Every figure may be absent.
 */
export interface ValuationInput {
  code: string;
  name?: string | null;
  currentPrice: number | null;
  eps: number | null;
  epsPred: number | null;
  bps: number | null;
  bpsPred: number | null;
  /** Trailing ROE, % */
  roe: number | null;
  /** Forward ROE, % */
  roePred: number | null;
  per: number | null;
  industryPer: number | null;
  perfYoy: string | null;
  perfVs3mAgo: string | null;
  perfVsConsensus: string | null;
}

export interface ValuationWeights {
  rim: number;
  industryPer: number;
  pegr: number;
}

export interface ValuationConfig {
  /** Hurdle rate for the residual-income model, % */
  requiredRoe: number;
  weights: ValuationWeights;
  /** Conservative multiplier applied to the blended estimate */
  haircut: number;
  /** EPS growth band (%, exclusive) in which the growth-multiple model applies */
  pegrMinGrowth: number;
  pegrMaxGrowth: number;
  /** Discrepancy (%) below which a security is undervalued */
  lowThreshold: number;
  /** Discrepancy (%) above which a security is overvalued */
  highThreshold: number;
  /** Performance-surprise label → multiplier; unknown labels are neutral */
  performanceAdjustments: Readonly<Record<string, number>>;
}

export interface GrowthRates {
  eps: number;
  bps: number;
  roe: number;
}

export interface SubModelValues {
  rim: number | null;
  industryPer: number | null;
  pegr: number | null;
}

export interface ValuationResult {
  code: string;
  name: string | null;
  date: string;
  fair_value: number;
  current_price: number;
  discrepancy_ratio: number;
  eps_growth_rate: number;
  bps_growth_rate: number;
  roe_growth_rate: number;
  peg_ratio: number | null;
  result: ValuationClass;
  // ── Diagnostics ──
  base_fair_value: number;
  rim_value: number | null;
  per_value: number | null;
  pegr_value: number | null;
  perf_adj_factor: number;
  perf_yoy: string | null;
  perf_vs_3m_ago: string | null;
  perf_vs_consensus: string | null;
}

export type NotEvaluableReason = "missing-input" | "no-model" | "error";

export type ValuationOutcome =
  | { evaluable: true; result: ValuationResult }
  | { evaluable: false; code: string; reason: NotEvaluableReason; detail: string };

export interface ValuationBatch {
  results: ValuationResult[];
  skipped: Array<{ code: string; reason: NotEvaluableReason; detail: string }>;
  evaluated: number;
  failed: number;
  total: number;
}
