import { Router } from "express";
import { z } from "zod";
import type { MarketRepository } from "../db/repository.js";
import { isoDateSchema, securityCodeSchema } from "../ingest/validation.js";
import { logRest } from "../logging.js";
import type { PipelineRun } from "../pipeline/runner.js";
import { PIPELINE_STEPS, type PipelineStep } from "../pipeline/types.js";
import { Screener, SUSTAINED_CROSSES, TREND_INDICATORS } from "../screening/screener.js";
import { toSeoulDate } from "../shared/dates.js";
import { errorMessage } from "../shared/errors.js";
import type { ValuationEngine } from "../valuation/engine.js";

export interface RouteDeps {
  repo: MarketRepository;
  screener: Screener;
  engine: ValuationEngine;
  /** Runs the pipeline unless one is already running (then resolves null) */
  runPipeline: (steps?: PipelineStep[]) => Promise<PipelineRun | null>;
  /** Default window for signal screens */
  lookbackDays: number;
}

const RESULT_CLASSES = ["UNDERVALUED", "OVERVALUED", "FAIR"] as const;

const positiveInt = z.coerce.number().int().positive();

const securitiesQuerySchema = z.object({
  market: z.string().trim().toUpperCase().optional(),
  limit: positiveInt.max(5000).optional(),
});

const codeParamsSchema = z.object({ code: securityCodeSchema });

const indicatorsQuerySchema = z.object({ limit: positiveInt.max(5000).default(250) });

const riskQuerySchema = z.object({
  months: positiveInt.max(120).default(3),
  asOf: isoDateSchema.optional(),
});

const valuationsQuerySchema = z.object({
  date: isoDateSchema.optional(),
  result: z.enum(RESULT_CLASSES).optional(),
});

const macdRsiQuerySchema = z.object({ days: positiveInt.max(250).optional() });

const sustainedTrendQuerySchema = z.object({
  days: positiveInt.max(250).optional(),
  cross: z.enum(SUSTAINED_CROSSES).default("macd"),
});

const trendContinuationQuerySchema = z.object({
  indicator: z.enum(TREND_INDICATORS),
  periods: positiveInt.max(250),
});

const valuationScreenQuerySchema = z.object({
  result: z.enum(RESULT_CLASSES),
  date: isoDateSchema.optional(),
});

const optionalNumber = z
  .number()
  .finite()
  .nullish()
  .transform((v) => v ?? null);
const optionalLabel = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const valuationInputSchema = z.object({
  code: z.string().trim().min(1),
  name: z.string().nullish(),
  currentPrice: optionalNumber,
  eps: optionalNumber,
  epsPred: optionalNumber,
  bps: optionalNumber,
  bpsPred: optionalNumber,
  roe: optionalNumber,
  roePred: optionalNumber,
  per: optionalNumber,
  industryPer: optionalNumber,
  perfYoy: optionalLabel,
  perfVs3mAgo: optionalLabel,
  perfVsConsensus: optionalLabel,
  date: isoDateSchema.optional(),
});

const pipelineRunBodySchema = z.object({
  steps: z.array(z.enum(PIPELINE_STEPS)).nonempty().optional(),
});

function firstIssue(error: z.ZodError, fallback: string): string {
  const issue = error.issues[0];
  if (!issue) return fallback;
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function createRouter(deps: RouteDeps): Router {
  const router = Router();
  const { repo, screener, engine } = deps;

  // ── Registry ─────────────────────────────────────────────────────────

  router.get("/securities", (req, res) => {
    const parsed = securitiesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const securities = repo.listSecurities({ market: parsed.data.market, limit: parsed.data.limit });
    res.json({ count: securities.length, securities });
  });

  router.get("/securities/:code/indicators", (req, res) => {
    const params = codeParamsSchema.safeParse(req.params);
    const query = indicatorsQuerySchema.safeParse(req.query);
    if (!params.success) {
      res.status(400).json({ error: firstIssue(params.error, "Invalid path params") });
      return;
    }
    if (!query.success) {
      res.status(400).json({ error: firstIssue(query.error, "Invalid query params") });
      return;
    }
    if (!repo.getSecurity(params.data.code)) {
      res.status(404).json({ error: `Unknown security ${params.data.code}` });
      return;
    }
    const states = repo.getIndicatorStates(params.data.code, query.data.limit);
    res.json({ code: params.data.code, count: states.length, states });
  });

  router.get("/securities/:code/risk", (req, res) => {
    const params = codeParamsSchema.safeParse(req.params);
    const query = riskQuerySchema.safeParse(req.query);
    if (!params.success) {
      res.status(400).json({ error: firstIssue(params.error, "Invalid path params") });
      return;
    }
    if (!query.success) {
      res.status(400).json({ error: firstIssue(query.error, "Invalid query params") });
      return;
    }
    const asOf = query.data.asOf ?? repo.getLatestTradeDate(params.data.code);
    if (asOf === null) {
      res.status(404).json({ error: `No prices stored for ${params.data.code}` });
      return;
    }
    const risk = screener.riskProfile(params.data.code, { asOf, months: query.data.months });
    if (risk === null) {
      res.status(404).json({ error: "Not enough price history in the window" });
      return;
    }
    res.json({ code: params.data.code, asOf, months: query.data.months, ...risk });
  });

  // ── Valuations ───────────────────────────────────────────────────────

  router.get("/valuations", (req, res) => {
    const parsed = valuationsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const valuations = repo.getValuations(parsed.data);
    res.json({ count: valuations.length, valuations });
  });

  router.post("/valuations/evaluate", (req, res) => {
    const parsed = valuationInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid valuation input") });
      return;
    }
    const { date, ...input } = parsed.data;
    const outcome = engine.evaluate(input, date ?? toSeoulDate(new Date()));
    res.json(outcome);
  });

  // ── Screens ──────────────────────────────────────────────────────────

  router.get("/screens/macd-rsi", (req, res) => {
    const parsed = macdRsiQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const hits = screener.findMacdRsiCoincidence(parsed.data.days ?? deps.lookbackDays);
    res.json({ count: hits.length, hits });
  });

  router.get("/screens/sustained-trend", (req, res) => {
    const parsed = sustainedTrendQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const hits = screener.findSustainedTrend({ days: parsed.data.days ?? deps.lookbackDays, cross: parsed.data.cross });
    res.json({ count: hits.length, hits });
  });

  router.get("/screens/trend-continuation", (req, res) => {
    const parsed = trendContinuationQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const hits = screener.findTrendContinuation(parsed.data);
    res.json({ count: hits.length, hits });
  });

  router.get("/screens/valuation", (req, res) => {
    const parsed = valuationScreenQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid query params") });
      return;
    }
    const hits = screener.findByValuation(parsed.data);
    res.json({ count: hits.length, hits });
  });

  // ── Pipeline ─────────────────────────────────────────────────────────

  router.post("/pipeline/run", async (req, res) => {
    const parsed = pipelineRunBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error, "Invalid body") });
      return;
    }
    try {
      const run = await deps.runPipeline(parsed.data.steps);
      if (run === null) {
        res.status(409).json({ error: "Pipeline already running" });
        return;
      }
      res.json(run);
    } catch (e) {
      logRest.error({ err: errorMessage(e) }, "Pipeline run via REST failed");
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  return router;
}
