const DAY_MS = 24 * 60 * 60 * 1000;

/** Parses `YYYY-MM-DD` as midnight UTC; null for anything else. */
export function parseDay(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) return null;
  return date;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Half-open range covering the days `from` through `to`. */
export function dayRange(from: Date, to: Date = from): { start: Date; end: Date } {
  return { start: startOfUtcDay(from), end: new Date(startOfUtcDay(to).getTime() + DAY_MS) };
}
