import { z } from "zod";

// ── Shared field parsers ─────────────────────────────────────────────────

const NULL_TOKENS = new Set(["", "-", "n/a", "na", "nan", "null", "none"]);

/**
 * Text → number for exported spreadsheets: thousands separators, percent signs
 * and blanks are tolerated; placeholder tokens become null. Anything else that is
 * not a number comes back as NaN so the schema rejects it.
 */
export function parseNumeric(v: unknown): unknown {
  if (v === undefined || v === null) return null;
  if (typeof v === "number") return v;
  if (typeof v !== "string") return v;
  const trimmed = v.trim();
  if (NULL_TOKENS.has(trimmed.toLowerCase())) return null;
  const n = Number(trimmed.replace(/[,%\s"]/g, ""));
  return n;
}

function parseLabel(v: unknown): unknown {
  if (v === undefined || v === null) return null;
  if (typeof v !== "string") return v;
  const trimmed = v.trim();
  return NULL_TOKENS.has(trimmed.toLowerCase()) ? null : trimmed;
}

/** KRX codes are six characters; numeric codes that lost leading zeros are padded back. */
function parseCode(v: unknown): unknown {
  if (typeof v === "number" && Number.isInteger(v)) return String(v).padStart(6, "0");
  if (typeof v !== "string") return v;
  const trimmed = v.trim().toUpperCase();
  return /^\d{1,5}$/.test(trimmed) ? trimmed.padStart(6, "0") : trimmed;
}

const nullableNumber = z.preprocess(parseNumeric, z.number().finite().nullable());
const nullableLabel = z.preprocess(parseLabel, z.string().nullable());

export const securityCodeSchema = z.preprocess(
  parseCode,
  z.string().regex(/^[0-9A-Z]{6}$/, "code must be 6 alphanumeric characters"),
);

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD");

// ── Price bars ───────────────────────────────────────────────────────────

export const priceBarSchema = z
  .object({
    code: securityCodeSchema,
    date: isoDateSchema,
    open: z.number().finite().positive(),
    high: z.number().finite().positive(),
    low: z.number().finite().positive(),
    close: z.number().finite().positive(),
    volume: z.number().finite().nonnegative(),
  })
  .superRefine((bar, ctx) => {
    if (bar.high < bar.low) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "high < low", path: ["high"] });
    }
    if (bar.high < Math.max(bar.open, bar.close)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "high below open/close", path: ["high"] });
    }
    if (bar.low > Math.min(bar.open, bar.close)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "low above open/close", path: ["low"] });
    }
  });

export type ValidPriceBar = z.infer<typeof priceBarSchema>;

export interface RejectedRecord {
  index: number;
  reason: string;
}

export interface ValidationOutcome<T> {
  valid: T[];
  rejected: RejectedRecord[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Splits raw records into schema-valid rows and indexed rejections. */
export function validateRecords<S extends z.ZodTypeAny>(
  schema: S,
  records: readonly unknown[],
): ValidationOutcome<z.infer<S>> {
  const out: ValidationOutcome<z.infer<S>> = { valid: [], rejected: [] };
  records.forEach((record, index) => {
    const parsed = schema.safeParse(record);
    if (parsed.success) out.valid.push(parsed.data);
    else out.rejected.push({ index, reason: formatIssues(parsed.error) });
  });
  return out;
}

export function validatePriceBars(records: readonly unknown[]): ValidationOutcome<ValidPriceBar> {
  return validateRecords(priceBarSchema, records);
}

// ── Fundamentals ─────────────────────────────────────────────────────────

export const fundamentalRowSchema = z.object({
  code: securityCodeSchema,
  date: isoDateSchema,
  market_cap: nullableNumber,
  shares_outstanding: nullableNumber,
  pbr: nullableNumber,
  per: nullableNumber,
  industry_per: nullableNumber,
  eps: nullableNumber,
  eps_pred: nullableNumber,
  roe: nullableNumber,
  roe_pred: nullableNumber,
  dividend_yield: nullableNumber,
  bps: nullableNumber,
  bps_pred: nullableNumber,
  per_pred: nullableNumber,
  pbr_pred: nullableNumber,
  perf_yoy: nullableLabel,
  perf_vs_3m_ago: nullableLabel,
  perf_vs_consensus: nullableLabel,
});

export type ValidFundamentalRow = z.infer<typeof fundamentalRowSchema>;

// ── Listings ─────────────────────────────────────────────────────────────

export const listingRowSchema = z.object({
  code: securityCodeSchema,
  name: z.string().trim().min(1, "name is required"),
  market: z.string().trim().min(1, "market is required").transform((m) => m.toUpperCase()),
});

export type ValidListingRow = z.infer<typeof listingRowSchema>;
