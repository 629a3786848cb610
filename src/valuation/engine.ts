/**
 * Composite fair-value engine.
 *
 * Blends three independent estimates (residual income, industry PER, growth
 * multiple) into one conservative fair value per security, adjusts it for
 * performance surprises and classifies the gap to the current price.
 *
 * The engine is pure: config in through the constructor, records in, results out.
 * Persistence and the process environment live with the callers.
 */
import { logValuation } from "../logging.js";
import { errorMessage, MissingInputError } from "../shared/errors.js";
import { DEFAULT_VALUATION_CONFIG } from "./config.js";
import { computeGrowthRates } from "./growth.js";
import { blendSubModels, computeSubModels } from "./models.js";
import { performanceAdjustment } from "./performance.js";
import type {
  ValuationBatch,
  ValuationClass,
  ValuationConfig,
  ValuationInput,
  ValuationOutcome,
  ValuationResult,
} from "./types.js";

const round2 = (v: number): number => Math.round(v * 100) / 100;

export class ValuationEngine {
  readonly config: ValuationConfig;

  constructor(config: ValuationConfig = DEFAULT_VALUATION_CONFIG) {
    this.config = config;
  }

  /** Strict thresholds: a discrepancy exactly on a threshold is FAIR. */
  classify(discrepancyPct: number): ValuationClass {
    if (discrepancyPct < this.config.lowThreshold) return "UNDERVALUED";
    if (discrepancyPct > this.config.highThreshold) return "OVERVALUED";
    return "FAIR";
  }

  /** PER / EPS growth, only when both are meaningful; otherwise null. */
  pegRatio(per: number | null, epsGrowth: number): number | null {
    if (per === null || !(per > 0)) return null;
    if (!(epsGrowth > this.config.pegrMinGrowth)) return null;
    return per / epsGrowth;
  }

  /** Fields whose absence makes the record impossible to value. */
  private missingInputs(input: ValuationInput): string[] {
    const missing: string[] = [];
    if (input.roePred === null || input.roePred === undefined) missing.push("roePred");
    if (input.bpsPred === null || input.bpsPred === undefined) missing.push("bpsPred");
    if (input.currentPrice === null || input.currentPrice === undefined || !(input.currentPrice > 0)) {
      missing.push("currentPrice");
    }
    return missing;
  }

  /**
   * Value one security. Never throws: missing inputs, no contributing model and
   * unexpected failures all come back as a not-evaluable outcome.
   */
  evaluate(input: ValuationInput, date: string): ValuationOutcome {
    const missing = this.missingInputs(input);
    const currentPrice = input.currentPrice;
    if (missing.length > 0 || currentPrice === null) {
      const err = new MissingInputError(missing, input.code);
      return { evaluable: false, code: input.code, reason: "missing-input", detail: err.message };
    }

    try {
      const cfg = this.config;
      const growth = computeGrowthRates(input);
      const models = computeSubModels(input, growth.eps, cfg);
      const blended = blendSubModels(models, cfg.weights);

      if (blended === null) {
        return {
          evaluable: false,
          code: input.code,
          reason: "no-model",
          detail: "No fair-value model produced a positive estimate",
        };
      }

      const baseFairValue = blended * cfg.haircut;
      const factor = performanceAdjustment(input, cfg.performanceAdjustments);
      const fairValue = baseFairValue * factor;
      if (!(fairValue > 0) || !Number.isFinite(fairValue)) {
        return {
          evaluable: false,
          code: input.code,
          reason: "no-model",
          detail: `Adjusted fair value is not positive (${fairValue})`,
        };
      }

      const discrepancy = ((currentPrice - fairValue) / fairValue) * 100;
      const peg = this.pegRatio(input.per, growth.eps);

      const result: ValuationResult = {
        code: input.code,
        name: input.name ?? null,
        date,
        fair_value: round2(fairValue),
        current_price: currentPrice,
        discrepancy_ratio: round2(discrepancy),
        eps_growth_rate: round2(growth.eps),
        bps_growth_rate: round2(growth.bps),
        roe_growth_rate: round2(growth.roe),
        peg_ratio: peg === null ? null : round2(peg),
        result: this.classify(discrepancy),
        base_fair_value: round2(baseFairValue),
        rim_value: models.rim === null ? null : round2(models.rim),
        per_value: models.industryPer === null ? null : round2(models.industryPer),
        pegr_value: models.pegr === null ? null : round2(models.pegr),
        perf_adj_factor: round2(factor),
        perf_yoy: input.perfYoy,
        perf_vs_3m_ago: input.perfVs3mAgo,
        perf_vs_consensus: input.perfVsConsensus,
      };
      return { evaluable: true, result };
    } catch (e) {
      return { evaluable: false, code: input.code, reason: "error", detail: errorMessage(e) };
    }
  }

  /**
   * Value every input independently. One security's gap or failure is logged and
   * recorded; the batch always runs to the end.
   */
  evaluateBatch(inputs: readonly ValuationInput[], date: string): ValuationBatch {
    const batch: ValuationBatch = { results: [], skipped: [], evaluated: 0, failed: 0, total: inputs.length };

    for (const input of inputs) {
      const outcome = this.evaluate(input, date);
      if (outcome.evaluable) {
        batch.results.push(outcome.result);
        batch.evaluated++;
        continue;
      }
      batch.skipped.push({ code: outcome.code, reason: outcome.reason, detail: outcome.detail });
      if (outcome.reason === "error") {
        batch.failed++;
        logValuation.error({ code: outcome.code, detail: outcome.detail }, "Valuation failed");
      } else {
        logValuation.debug({ code: outcome.code, reason: outcome.reason, detail: outcome.detail }, "Security not evaluable");
      }
    }

    logValuation.info(
      { date, total: batch.total, evaluated: batch.evaluated, skipped: batch.skipped.length, failed: batch.failed },
      `Valuation batch: ${batch.evaluated} of ${batch.total} evaluated, ${batch.skipped.length} skipped`,
    );
    return batch;
  }
}
