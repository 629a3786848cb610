export type CoreErrorCode = "missing-input" | "arithmetic-degenerate" | "insufficient-history";

/**
 * Base for the recoverable, per-security failures of the analytics core.
 * Batches catch these, record the reason and move on to the next security.
 */
export class CoreError extends Error {
  readonly code: CoreErrorCode;
  readonly security: string | null;

  constructor(code: CoreErrorCode, message: string, security: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.security = security;
  }
}

/** Required fields absent or null. */
export class MissingInputError extends CoreError {
  readonly fields: string[];

  constructor(fields: string[], security: string | null = null) {
    super("missing-input", `Missing required input: ${fields.join(", ")}`, security);
    this.fields = fields;
  }
}

/** A formula hit a zero or negative denominator that no sentinel covers. */
export class ArithmeticDegenerateError extends CoreError {
  constructor(message: string, security: string | null = null) {
    super("arithmetic-degenerate", message, security);
  }
}

/** Fewer data points than a computation requires. */
export class InsufficientHistoryError extends CoreError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number, security: string | null = null) {
    super("insufficient-history", `Need at least ${required} data points, got ${actual}`, security);
    this.required = required;
    this.actual = actual;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
