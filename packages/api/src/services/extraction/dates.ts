/**
 * Date normalization for extracted payloads.
 *
 * Values under date-like keys (`date`, `*_date`, `*Date`) are rewritten to
 * `YYYY-MM-DD` when they name a single unambiguous calendar day. Numeric
 * `D/M/YYYY` forms are read day-first. Anything else is left exactly as given.
 */

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12
};

const ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const YEAR_FIRST_SLASH = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;
const DAY_FIRST_NUMERIC = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const DAY_MONTH_NAME = /^(\d{1,2})(?:st|nd|rd|th)?(?:\s+of)?[\s-]+([A-Za-z]+)\.?,?[\s-]+(\d{4})$/i;
const MONTH_NAME_DAY = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i;

function toIso(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) return null;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function monthNumber(name: string): number | undefined {
  return MONTHS[name.toLowerCase()];
}

/**
 * @example
 * normalizeDate('1st March 2025'); // '2025-03-01'
 * normalizeDate('05/03/2025');     // '2025-03-05' (day-first)
 * normalizeDate('on signature');   // 'on signature'
 */
export function normalizeDate(value: string): string {
  const text = value.trim();
  let m: RegExpExecArray | null;

  if ((m = ISO.exec(text)) || (m = YEAR_FIRST_SLASH.exec(text))) {
    return toIso(Number(m[1]), Number(m[2]), Number(m[3])) ?? value;
  }
  if ((m = DAY_FIRST_NUMERIC.exec(text))) {
    return toIso(Number(m[3]), Number(m[2]), Number(m[1])) ?? value;
  }
  if ((m = DAY_MONTH_NAME.exec(text))) {
    const month = monthNumber(m[2] ?? '');
    return month ? (toIso(Number(m[3]), month, Number(m[1])) ?? value) : value;
  }
  if ((m = MONTH_NAME_DAY.exec(text))) {
    const month = monthNumber(m[1] ?? '');
    return month ? (toIso(Number(m[3]), month, Number(m[2])) ?? value) : value;
  }
  return value;
}

export function isDateKey(key: string): boolean {
  return key.toLowerCase() === 'date' || key.endsWith('_date') || /[a-z0-9]Date$/.test(key);
}

/**
 * Walk a parsed payload and normalize string values under date-like keys,
 * including strings inside arrays held by such keys. Returns a new value.
 */
export function normalizeDates(value: unknown, underDateKey = false): unknown {
  if (typeof value === 'string') {
    return underDateKey ? normalizeDate(value) : value;
  }
  if (Array.isArray(value)) {
    return value.map(item => normalizeDates(item, underDateKey));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = normalizeDates(child, isDateKey(key));
    }
    return out;
  }
  return value;
}
