/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for anything else
 * that is not an integer.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}
