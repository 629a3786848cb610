import type { MarketRepository } from "../db/repository.js";
import { ValuationEngine } from "../valuation/engine.js";
import type { ValuationBatch } from "../valuation/types.js";
import { emptySummary, type StepSummary } from "./types.js";

export interface ValuationUpdateOptions {
  date: string;
  limit: number | null;
}

export interface ValuationStep {
  summary: StepSummary;
  batch: ValuationBatch;
}

/** Value every snapshot on `date` and store the evaluable results. */
export function updateValuations(
  repo: MarketRepository,
  engine: ValuationEngine,
  opts: ValuationUpdateOptions,
): ValuationStep {
  let inputs = repo.getValuationInputs(opts.date);
  if (opts.limit != null && opts.limit > 0) inputs = inputs.slice(0, opts.limit);

  const batch = engine.evaluateBatch(inputs, opts.date);
  if (batch.results.length > 0) repo.upsertValuations(batch.results);

  const summary = emptySummary("valuation", batch.total);
  summary.processed = batch.evaluated;
  for (const s of batch.skipped) {
    const entry = { code: s.code, reason: s.reason === "error" ? s.detail : s.reason };
    if (s.reason === "error") summary.failed.push(entry);
    else summary.skipped.push(entry);
  }
  return { summary, batch };
}
