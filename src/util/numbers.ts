// Lenient numeric parsing for exchange payloads.
// Bybit sends every number as a string and occasionally "" for missing values.
// Anything that does not parse becomes the fallback (0 by default), which then
// fails the positivity checks downstream instead of throwing mid-cycle.

export function safeParseFloat(val: unknown, fallback: number = 0): number {
  if (val === undefined || val === null) return fallback;
  if (typeof val === "number") return Number.isFinite(val) ? val : fallback;
  if (typeof val === "string") {
    const parsed = parseFloat(val);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function safeParseInt(val: unknown, fallback: number = 0): number {
  return Math.trunc(safeParseFloat(val, fallback));
}
