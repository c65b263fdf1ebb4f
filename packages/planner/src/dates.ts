// packages/planner/src/dates.ts
// Relative and explicit date phrases -> half-open [start, end) windows.
import { parseDate } from '@shipquery/catalog';

export interface DateWindow {
  phrase: string;
  start: Date;
  end: Date;
}

const DAY_MS = 86_400_000;
// "last N days" further back than this is read as this many days
export const MAX_LOOKBACK_DAYS = 36_500;
const MAX_DATE_WORDS = 4;

// ---------- tiny helpers ----------
const startOfDay = (d: Date) => new Date(d.getFullYear(), d.getMonth(), d.getDate());
const daysBack = (now: Date, n: number): Date =>
  new Date(now.getTime() - Math.min(n, MAX_LOOKBACK_DAYS) * DAY_MS);
const ordered = (phrase: string, a: Date, b: Date): DateWindow =>
  a <= b ? { phrase, start: a, end: b } : { phrase, start: b, end: a };
const bare = (w: string) => w.replace(/[?!,;.]+$/, '');

// shortest run of words starting at `at` that parses as a date
function dateAt(words: readonly string[], at: number): { date: Date; next: number } | null {
  for (let k = 1; k <= MAX_DATE_WORDS && at + k <= words.length; k++) {
    const last = words[at + k - 1];
    const date = parseDate(words.slice(at, at + k).map(bare).join(' '));
    if (date) return { date, next: at + k };
    if (bare(last) !== last) break; // punctuation ends the clause
  }
  return null;
}

// "<keyword> <date> <separator> <date>", e.g. "between A and B", "from A to B"
function span(keywords: ReadonlySet<string>, separators: ReadonlySet<string>) {
  return (text: string): DateWindow | null => {
    const words = text.trim().split(/\s+/);
    for (let i = 0; i < words.length; i++) {
      if (!keywords.has(words[i].toLowerCase())) continue;
      const a = dateAt(words, i + 1);
      if (!a || a.next >= words.length || !separators.has(words[a.next].toLowerCase())) continue;
      const b = dateAt(words, a.next + 1);
      if (!b) continue;
      return ordered(bare(words.slice(i, b.next).join(' ')), a.date, b.date);
    }
    return null;
  };
}

const between = span(new Set(['between']), new Set(['and']));
const fromTo = span(new Set(['from']), new Set(['to', 'until', 'till', 'through']));

type DateRule = (text: string, now: Date) => DateWindow | null;

// first match wins
const DATE_RULES: DateRule[] = [
  between,
  fromTo,
  (t, now) => {
    const m = t.match(/\b(?:this|current)\s+month\b/i);
    if (!m) return null;
    return { phrase: m[0], start: new Date(now.getFullYear(), now.getMonth(), 1), end: new Date(now.getFullYear(), now.getMonth() + 1, 1) };
  },
  (t, now) => {
    const m = t.match(/\b(?:last|previous)\s+month\b/i);
    if (!m) return null;
    return { phrase: m[0], start: new Date(now.getFullYear(), now.getMonth() - 1, 1), end: new Date(now.getFullYear(), now.getMonth(), 1) };
  },
  (t, now) => {
    const m = t.match(/\b(?:this|current)\s+year\b/i);
    if (!m) return null;
    return { phrase: m[0], start: new Date(now.getFullYear(), 0, 1), end: new Date(now.getFullYear() + 1, 0, 1) };
  },
  (t, now) => {
    // weeks start on Monday
    const m = t.match(/\b(?:this|current)\s+week\b/i);
    if (!m) return null;
    const today = startOfDay(now);
    const offset = (today.getDay() + 6) % 7;
    const monday = new Date(today.getFullYear(), today.getMonth(), today.getDate() - offset);
    return { phrase: m[0], start: monday, end: new Date(monday.getFullYear(), monday.getMonth(), monday.getDate() + 7) };
  },
  (t, now) => {
    const m = t.match(/\b(?:last|past)\s+(\d+)\s+days?\b/i);
    if (!m) return null;
    return { phrase: m[0], start: daysBack(now, Number(m[1])), end: now };
  },
  (t, now) => {
    const m = t.match(/\b(?:last|past)\s+(\d+)\s+weeks?\b/i);
    if (!m) return null;
    return { phrase: m[0], start: daysBack(now, Number(m[1]) * 7), end: now };
  },
  (t, now) => {
    const m = t.match(/\b(?:last|past)\s+week\b|\brecent(?:ly)?\b/i);
    if (!m) return null;
    return { phrase: m[0], start: daysBack(now, 7), end: now };
  },
];

export function extractDateWindow(text: string, now: Date): DateWindow | null {
  for (const rule of DATE_RULES) {
    const w = rule(text, now);
    if (w) return w;
  }
  return null;
}
