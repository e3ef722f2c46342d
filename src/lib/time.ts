export function nowIso(): string {
  return new Date().toISOString();
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a calendar date in `YYYY-MM-DD` form. Returns null for anything else,
 * including well-formed strings naming an impossible day such as 2024-02-30.
 */
export function parseIsoDate(value: string): string | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  const normalized = date.toISOString().slice(0, 10);
  return normalized === value.trim() ? normalized : null;
}
