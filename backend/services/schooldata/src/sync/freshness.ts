// backend/services/schooldata/src/sync/freshness.ts
import {
  dateKey,
  sectionKey,
  type CacheKey,
  type CacheRecord,
  type Section,
} from "../contracts/cache.contract";
import { isSectioned, type DataType } from "../contracts/dataType";
import { eachDate, type DateRange, type IsoDate } from "../utils/dates";

export type SectionBounds = { grades: number; classes: number };

export function allSections(bounds: SectionBounds): Section[] {
  const out: Section[] = [];
  for (let grade = 1; grade <= bounds.grades; grade++) {
    for (let classNo = 1; classNo <= bounds.classes; classNo++) out.push({ grade, classNo });
  }
  return out;
}

export function withinBounds(section: Section, bounds: SectionBounds): boolean {
  return (
    section.grade >= 1 &&
    section.grade <= bounds.grades &&
    section.classNo >= 1 &&
    section.classNo <= bounds.classes
  );
}

/** Keys a complete cache holds for one date. */
export function expectedKeys(dataType: DataType, date: IsoDate, bounds: SectionBounds): CacheKey[] {
  if (!isSectioned(dataType)) return [dateKey(dataType, date)];
  return allSections(bounds).map((s) => sectionKey(date, s));
}

/** Stale when now − syncedAt > ttl; a record exactly ttl old is still fresh. */
export function isFresh(syncedAt: Date, now: Date, ttlMs: number): boolean {
  return now.getTime() - syncedAt.getTime() <= ttlMs;
}

/**
 * Dates of the range that need a fetch: no record, a stale record, or (for
 * sectioned types) fewer fresh sections than the bounds expect.
 */
export function staleDates(
  dataType: DataType,
  range: DateRange,
  records: CacheRecord[],
  opts: { now: Date; ttlMs: number; bounds: SectionBounds }
): IsoDate[] {
  const expected = isSectioned(dataType) ? opts.bounds.grades * opts.bounds.classes : 1;
  const freshPerDate = new Map<IsoDate, number>();
  for (const r of records) {
    if (r.dataType !== dataType || !isFresh(r.syncedAt, opts.now, opts.ttlMs)) continue;
    if (isSectioned(dataType)) {
      if (r.grade === null || r.classNo === null) continue;
      if (!withinBounds({ grade: r.grade, classNo: r.classNo }, opts.bounds)) continue;
    }
    freshPerDate.set(r.date, (freshPerDate.get(r.date) ?? 0) + 1);
  }
  return eachDate(range).filter((d) => (freshPerDate.get(d) ?? 0) < expected);
}
