/**
 * Convert a CLI id argument to an integer the way a loose integer cast does:
 * leading digits are kept, anything non-numeric becomes 0.
 *
 * Examples:
 *   "42"    → 42
 *   "42abc" → 42
 *   "abc"   → 0
 */
export function toId(raw: string | number | undefined): number {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? Math.trunc(raw) : 0;
  }
  if (raw === undefined) return 0;
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}
