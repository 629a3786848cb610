export interface FallbackHit<T> {
  key: string;
  value: T;
  usedFallback: boolean;
}

/**
 * Best-effort lookup: try `primaryKey`, and if it yields nothing, try the one
 * key `deriveFallback` produces. Never more than one retry. Errors other than
 * "not found" (a null result) propagate.
 */
export async function lookupWithFallback<T>(
  primaryKey: string,
  deriveFallback: (key: string) => string | null,
  lookup: (key: string) => Promise<T | null>,
): Promise<FallbackHit<T> | null> {
  const primary = await lookup(primaryKey);
  if (primary !== null) return { key: primaryKey, value: primary, usedFallback: false };

  const fallbackKey = deriveFallback(primaryKey);
  if (fallbackKey === null || fallbackKey === primaryKey) return null;

  const fallback = await lookup(fallbackKey);
  return fallback === null ? null : { key: fallbackKey, value: fallback, usedFallback: true };
}
