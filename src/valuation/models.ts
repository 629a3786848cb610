import type { SubModelId, SubModelValues, ValuationConfig, ValuationInput, ValuationWeights } from "./types.js";

function positive(v: number): number | null {
  return Number.isFinite(v) && v > 0 ? v : null;
}

/**
 * Residual income model: book value plus the capitalized excess return over the
 * hurdle rate. Needs roePred >= 0 and bpsPred > 0.
 */
export function residualIncomeValue(
  roePred: number | null,
  bpsPred: number | null,
  requiredRoe: number,
): number | null {
  if (roePred === null || bpsPred === null) return null;
  if (roePred < 0 || bpsPred <= 0 || requiredRoe <= 0) return null;
  const excessProfitPerShare = (roePred / 100 - requiredRoe / 100) * bpsPred;
  return positive(bpsPred + excessProfitPerShare / (requiredRoe / 100));
}

/** Forward EPS priced at the industry's PER. */
export function industryMultipleValue(epsPred: number | null, industryPer: number | null): number | null {
  if (epsPred === null || industryPer === null) return null;
  if (industryPer <= 0 || epsPred <= 0) return null;
  return positive(epsPred * industryPer);
}

/**
 * Growth-scaled multiple (PEG = 1): forward EPS times EPS growth %. Only inside the
 * (min, max) growth band, which keeps shrinking or explosive growth out.
 */
export function growthMultipleValue(
  epsPred: number | null,
  epsGrowth: number,
  minGrowth: number,
  maxGrowth: number,
): number | null {
  if (epsPred === null || epsPred <= 0) return null;
  if (!(epsGrowth > minGrowth && epsGrowth < maxGrowth)) return null;
  return positive(epsGrowth * epsPred);
}

export function computeSubModels(input: ValuationInput, epsGrowth: number, cfg: ValuationConfig): SubModelValues {
  return {
    rim: residualIncomeValue(input.roePred, input.bpsPred, cfg.requiredRoe),
    industryPer: industryMultipleValue(input.epsPred, input.industryPer),
    pegr: growthMultipleValue(input.epsPred, epsGrowth, cfg.pegrMinGrowth, cfg.pegrMaxGrowth),
  };
}

/**
 * Weighted average of the contributing models, renormalized over their weights
 * only: an excluded model drops out of numerator and denominator alike.
 * Returns null when nothing contributes.
 */
export function blendSubModels(values: SubModelValues, weights: ValuationWeights): number | null {
  const ids: SubModelId[] = ["rim", "industryPer", "pegr"];
  const contributing = ids.flatMap((id) => {
    const value = values[id];
    const weight = weights[id];
    return value !== null && weight > 0 ? [{ value, weight }] : [];
  });
  if (contributing.length === 0) return null;

  const weightSum = contributing.reduce((s, c) => s + c.weight, 0);
  return contributing.reduce((s, c) => s + c.value * (c.weight / weightSum), 0);
}
