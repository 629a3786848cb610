export const PIPELINE_STEPS = ["prices", "indicators", "risk", "valuation", "report"] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export interface SkippedSecurity {
  code: string;
  reason: string;
}

/** Outcome of one batch step. Per-security problems land in `skipped` or `failed`. */
export interface StepSummary {
  step: PipelineStep;
  total: number;
  processed: number;
  skipped: SkippedSecurity[];
  failed: SkippedSecurity[];
}

export function emptySummary(step: PipelineStep, total: number): StepSummary {
  return { step, total, processed: 0, skipped: [], failed: [] };
}
