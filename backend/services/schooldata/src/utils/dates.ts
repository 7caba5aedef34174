// backend/services/schooldata/src/utils/dates.ts
/**
 * Calendar-date helpers. IsoDate is "YYYY-MM-DD" with no time component, so
 * lexical order is chronological order. All arithmetic runs in UTC to stay
 * clear of DST; "today" is resolved in the configured time zone.
 */

export type IsoDate = string;

export type DateRange = { start: IsoDate; end: IsoDate };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDate(v: string): boolean {
  const m = ISO_DATE.exec(v);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return toIsoDate(d) === v;
}

function toUtcMs(date: IsoDate): number {
  const m = ISO_DATE.exec(date);
  if (!m) throw new Error(`Invalid ISO date: "${date}"`);
  return Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
}

function toIsoDate(d: Date): IsoDate {
  return d.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(toUtcMs(date) + days * DAY_MS));
}

/** Inclusive day count; 1 for a single-day range. */
export function spanDays(range: DateRange): number {
  return Math.round((toUtcMs(range.end) - toUtcMs(range.start)) / DAY_MS) + 1;
}

export function eachDate(range: DateRange): IsoDate[] {
  const out: IsoDate[] = [];
  for (let d = range.start; d <= range.end; d = addDays(d, 1)) out.push(d);
  return out;
}

export function inRange(date: IsoDate, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}

/** Smallest range holding every date; null for none. */
export function spanOf(dates: Iterable<IsoDate>): DateRange | null {
  let span: DateRange | null = null;
  for (const d of dates) {
    if (!span) span = { start: d, end: d };
    else if (d < span.start) span.start = d;
    else if (d > span.end) span.end = d;
  }
  return span;
}

export function intersect(a: DateRange, b: DateRange): DateRange | null {
  const start = a.start > b.start ? a.start : b.start;
  const end = a.end < b.end ? a.end : b.end;
  return start <= end ? { start, end } : null;
}

/** "20240301" → "2024-03-01"; null when not a real date. */
export function fromCompact(v: string): IsoDate | null {
  const m = /^(\d{4})(\d{2})(\d{2})$/.exec(v.trim());
  if (!m) return null;
  const iso = `${m[1]}-${m[2]}-${m[3]}`;
  return isIsoDate(iso) ? iso : null;
}

export function toCompact(date: IsoDate): string {
  return date.replace(/-/g, "");
}

/** Calendar date and wall-clock time of an instant in the given IANA zone. */
export function zonedParts(
  at: Date,
  timeZone: string
): { date: IsoDate; hour: number; minute: number } {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(at);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "";
  return {
    date: `${get("year")}-${get("month")}-${get("day")}`,
    hour: Number(get("hour")),
    minute: Number(get("minute")),
  };
}

export function todayIn(timeZone: string, at: Date): IsoDate {
  return zonedParts(at, timeZone).date;
}

/**
 * Sorted unique dates → maximal contiguous runs, each cut to at most
 * maxSpanDays days.
 */
export function coalesceRuns(dates: IsoDate[], maxSpanDays: number): DateRange[] {
  const sorted = [...new Set(dates)].sort();
  const runs: DateRange[] = [];
  for (const d of sorted) {
    const last = runs[runs.length - 1];
    if (last && addDays(last.end, 1) === d && spanDays(last) < maxSpanDays) {
      last.end = d;
    } else {
      runs.push({ start: d, end: d });
    }
  }
  return runs;
}
