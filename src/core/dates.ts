const DATE_PATTERNS: RegExp[] = [
  /^(\d{4})(\d{2})(\d{2})$/, // 20250701
  /^(\d{4})[-./](\d{1,2})[-./](\d{1,2})(?:[T\s].*)?$/, // 2025-07-01, 2025.7.1, 2025-07-01T09:00:00Z
];

/**
 * Normalize a loosely formatted calendar date to YYYY-MM-DD.
 * Returns null for empty or impossible dates (2025-02-30).
 */
export function toIsoDate(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const text = String(value).trim();
  if (!text) return null;

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return null;
    }
    return date.toISOString().slice(0, 10);
  }
  return null;
}

/**
 * Normalize a timestamp to ISO 8601 (UTC). Bare dates become midnight UTC.
 */
export function toIsoTimestamp(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;

  const dateOnly = toIsoDate(text);
  if (dateOnly && !/[T\s]\d/.test(text)) {
    return `${dateOnly}T00:00:00.000Z`;
  }

  // "2025-07-01 09:30:00" is read as UTC, like the dates above
  const candidate = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(:\d{2})?$/.test(text) ? `${text.replace(' ', 'T')}Z` : text;
  const ms = Date.parse(candidate);
  if (Number.isNaN(ms)) return null;
  return new Date(ms).toISOString();
}

/**
 * Millisecond value for ordering; missing timestamps sort first
 */
export function timestampValue(value: string | null): number {
  if (!value) return Number.NEGATIVE_INFINITY;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}
