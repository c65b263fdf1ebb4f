// Permissive cell parsers shared by type inference and ingestion coercion.

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const ISO_ZONED_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;
const NUMERIC_DATE_RE = /^(\d{1,4})[/.-](\d{1,2})[/.-](\d{1,4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const MONTH_NAME_RE =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b\.?/i;
const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

function localDate(y: number, m: number, d: number, hh = 0, mm = 0, ss = 0): Date | null {
  if (m < 1 || m > 12 || d < 1 || d > 31 || hh > 23 || mm > 59 || ss > 59) return null;
  const dt = new Date(y, m - 1, d, hh, mm, ss, 0);
  // reject overflow such as 31 Feb
  if (dt.getFullYear() !== y || dt.getMonth() !== m - 1 || dt.getDate() !== d) return null;
  return dt;
}

function expandYear(y: number, digits: number): number {
  if (digits > 2) return y;
  return y < 70 ? 2000 + y : 1900 + y;
}

function parseNumericDate(m: RegExpMatchArray): Date | null {
  const [a, b, c] = [m[1], m[2], m[3]];
  const hh = m[4] ? Number(m[4]) : 0;
  const mm = m[5] ? Number(m[5]) : 0;
  const ss = m[6] ? Number(m[6]) : 0;

  if (a.length === 4) return localDate(Number(a), Number(b), Number(c), hh, mm, ss);
  if (c.length === 3) return null;

  const year = expandYear(Number(c), c.length);
  const first = Number(a), second = Number(b);
  // month-first unless the first part cannot be a month
  if (first > 12) return localDate(year, second, first, hh, mm, ss);
  return localDate(year, first, second, hh, mm, ss);
}

function parseMonthNameDate(s: string): Date | null {
  const mm = s.match(MONTH_NAME_RE);
  if (!mm) return null;
  const month = MONTHS[mm[1].slice(0, 3).toLowerCase()];
  const rest = s.replace(mm[0], ' ');
  const year = rest.match(/\b(\d{4})\b/);
  if (!year) return null;
  const day = rest.replace(year[0], ' ').match(/\b(\d{1,2})(?:st|nd|rd|th)?\b/);
  return localDate(Number(year[1]), month, day ? Number(day[1]) : 1);
}

/**
 * Parse a cell as a date. Accepts Date instances, ISO dates, numeric dates
 * with - / . separators (month first, day first when the first part exceeds 12),
 * and text with a month name and a four-digit year. A bare number is never a date.
 */
export function parseDate(v: unknown): Date | null {
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v;
  if (typeof v !== 'string') return null;
  const s = v.trim();
  if (!s) return null;

  if (ISO_ZONED_RE.test(s)) {
    const t = Date.parse(s);
    return Number.isNaN(t) ? null : new Date(t);
  }
  const iso = s.match(ISO_RE);
  if (iso) {
    return localDate(
      Number(iso[1]), Number(iso[2]), Number(iso[3]),
      iso[4] ? Number(iso[4]) : 0, iso[5] ? Number(iso[5]) : 0, iso[6] ? Number(iso[6]) : 0
    );
  }
  const numeric = s.match(NUMERIC_DATE_RE);
  if (numeric) return parseNumericDate(numeric);
  if (s.length <= 40) return parseMonthNameDate(s);
  return null;
}

/**
 * Parse a cell as a number. Thousands separators and a leading currency
 * symbol are accepted; integers beyond the safe range stay text.
 */
export function parseNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v !== 'string') return null;
  const s = v.trim().replace(/,/g, '').replace(/^([+-]?)[$€£₹]\s*/, '$1');
  if (!s || !NUMBER_RE.test(s)) return null;
  const n = Number(s);
  if (!Number.isFinite(n)) return null;
  if (!s.includes('.') && !Number.isSafeInteger(n)) return null;
  return n;
}

export function isEmptyCell(v: unknown): boolean {
  return v === null || v === undefined || (typeof v === 'string' && v.trim() === '');
}
