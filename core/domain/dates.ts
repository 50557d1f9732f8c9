// core/domain/dates.ts
// Resume dates are kept as ISO "YYYY-MM-DD" strings. Year-only and month-only
// values land on the first day of the period.

export type DatePrecision = "year" | "month" | "exact" | "unknown";

export type DatePoint =
  | { kind: "date"; iso: string; precision: Exclude<DatePrecision, "unknown"> }
  | { kind: "present" };

export type DateRange = {
  start: string;
  end: string | null; // null = still open
  precision: DatePrecision;
};

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PER_MONTH = 30.44;

const PRESENT_WORDS = new Set(["present", "current", "now", "today", "ongoing", "date"]);

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const PRECISION_RANK: Record<DatePrecision, number> = { exact: 0, month: 1, year: 2, unknown: 3 };

export function toIso(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

export function validYear(y: number) {
  return Number.isInteger(y) && y >= MIN_YEAR && y <= MAX_YEAR;
}

function validDay(y: number, m: number, d: number) {
  if (m < 1 || m > 12 || d < 1) return false;
  const last = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return d <= last;
}

export function parseDatePoint(raw: string): DatePoint | null {
  const s = raw.trim().toLowerCase().replace(/[.,;]+$/, "");
  if (!s) return null;
  if (PRESENT_WORDS.has(s) || s === "to date") return { kind: "present" };

  let m = s.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (m) {
    const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
    if (!validYear(y) || !validDay(y, mo, d)) return null;
    return { kind: "date", iso: toIso(y, mo, d), precision: "exact" };
  }

  m = s.match(/^(\d{4})[-/.](\d{1,2})$/);
  if (m) return monthPoint(Number(m[1]), Number(m[2]));

  m = s.match(/^(\d{1,2})[/.-](\d{4})$/);
  if (m) return monthPoint(Number(m[2]), Number(m[1]));

  m = s.match(/^([a-z]+)\.?,?\s+(\d{4})$/);
  if (m) {
    const month = MONTHS[m[1]];
    if (!month) return null;
    return monthPoint(Number(m[2]), month);
  }

  m = s.match(/^(\d{4})$/);
  if (m) {
    const y = Number(m[1]);
    if (!validYear(y)) return null;
    return { kind: "date", iso: toIso(y, 1, 1), precision: "year" };
  }

  return null;
}

function monthPoint(year: number, month: number): DatePoint | null {
  if (!validYear(year) || month < 1 || month > 12) return null;
  return { kind: "date", iso: toIso(year, month, 1), precision: "month" };
}

/** First day of the period after `iso` at the given precision. */
export function nextPeriod(iso: string, precision: DatePrecision): string {
  const d = new Date(Date.parse(iso));
  if (precision === "year") return toIso(d.getUTCFullYear() + 1, 1, 1);
  if (precision === "month") {
    const next = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1));
    return toIso(next.getUTCFullYear(), next.getUTCMonth() + 1, 1);
  }
  return new Date(Date.parse(iso) + DAY_MS).toISOString().slice(0, 10);
}

function coarser(a: DatePrecision, b: DatePrecision): DatePrecision {
  return PRECISION_RANK[a] >= PRECISION_RANK[b] ? a : b;
}

function buildRange(startRaw: string, endRaw: string): DateRange | null {
  const start = parseDatePoint(startRaw);
  const end = parseDatePoint(endRaw);
  if (!start || !end || start.kind !== "date") return null;
  if (end.kind === "present") return { start: start.iso, end: null, precision: start.precision };
  return { start: start.iso, end: end.iso, precision: coarser(start.precision, end.precision) };
}

/**
 * Parses "MM/YYYY - MM/YYYY", "Jan 2020 – Present", "2019-2021", "2018 to 2020" and
 * single points. A single point covers its whole period ("2020" → [2020-01-01, 2021-01-01)).
 * Returns null when nothing usable is found.
 */
export function parseDateRange(raw: string): DateRange | null {
  const s = raw.trim();
  if (!s) return null;

  const words = s.split(/\s*(?:–|—|\bto\b|\buntil\b|\btill\b)\s*/i);
  if (words.length === 2) return buildRange(words[0], words[1]);

  for (let i = s.indexOf("-"); i !== -1; i = s.indexOf("-", i + 1)) {
    const range = buildRange(s.slice(0, i), s.slice(i + 1));
    if (range) return range;
  }

  const single = parseDatePoint(s);
  if (single && single.kind === "date") {
    return { start: single.iso, end: nextPeriod(single.iso, single.precision), precision: single.precision };
  }
  return null;
}

export function toEpochMs(iso: string): number {
  return Date.parse(iso.length === 10 ? `${iso}T00:00:00Z` : iso);
}

export function daysBetween(startIso: string, endIso: string): number {
  return Math.round((toEpochMs(endIso) - toEpochMs(startIso)) / DAY_MS);
}

export function daysToMonths(days: number): number {
  return Math.round((days / DAYS_PER_MONTH) * 10) / 10;
}

/** Calendar date of an ISO timestamp ("2026-10-18T09:00:00Z" → "2026-10-18"). */
export function isoDay(nowIso: string): string {
  return new Date(toEpochMs(nowIso)).toISOString().slice(0, 10);
}
