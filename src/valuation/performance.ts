import type { ValuationInput } from "./types.js";

/**
 * Combined multiplier from the three performance-surprise flags. Absent flags and
 * labels missing from the table count as 1.0.
 */
export function performanceAdjustment(
  input: Pick<ValuationInput, "perfYoy" | "perfVs3mAgo" | "perfVsConsensus">,
  table: Readonly<Record<string, number>>,
): number {
  let factor = 1.0;
  for (const flag of [input.perfYoy, input.perfVs3mAgo, input.perfVsConsensus]) {
    if (!flag) continue;
    const label = flag.trim();
    const multiplier = Object.prototype.hasOwnProperty.call(table, label) ? table[label] : undefined;
    if (multiplier !== undefined && Number.isFinite(multiplier)) factor *= multiplier;
  }
  return factor;
}
