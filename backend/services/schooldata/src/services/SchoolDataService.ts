// backend/services/schooldata/src/services/SchoolDataService.ts
/**
 * Purpose:
 * - Read path over the cache: validate a requested range, bring it up to date
 *   (bounded wait), read it back as per-day views.
 *
 * Invariants:
 * - Requested ranges are validated before any connector call.
 * - readCached/readDays never trigger a sync.
 * - A caller that stops waiting (timeout or disconnect) still gets the cache
 *   as it is; the sync it joined keeps running.
 */

import { ServiceBase } from "@shared/base/ServiceBase";
import {
  PAYLOAD_SCHEMAS,
  cacheKeyId,
  dateKey,
  sectionKey,
  toCellView,
  type CacheRecord,
  type CellView,
  type MealPayload,
  type SchedulePayload,
  type Section,
  type TimetablePayload,
  type WaterTemperaturePayload,
  type WeatherPayload,
} from "../contracts/cache.contract";
import { DATA_TYPES, type DataType } from "../contracts/dataType";
import {
  RangeValidationError,
  ServiceUnavailableError,
  StoreError,
  SyncDetachedError,
} from "../errors";
import type { ICacheStore } from "../repo/cache.store.types";
import { allSections, isFresh, withinBounds, type SectionBounds } from "../sync/freshness";
import { validateRequestedRange } from "../sync/rangeValidation";
import type { CellFailure, ISyncEngine, SyncResult } from "../sync/sync.types";
import { eachDate, type DateRange, type IsoDate } from "../utils/dates";

export type TimetableCell = Section & { cell: CellView<TimetablePayload> };

export type DayView = {
  date: IsoDate;
  meal: CellView<MealPayload>;
  schedule: CellView<SchedulePayload>;
  weather: CellView<WeatherPayload>;
  waterTemperature: CellView<WaterTemperaturePayload>;
  /** One entry for a selected section, otherwise the full grade × class grid. */
  timetable: TimetableCell[];
};

export type SyncSummary = {
  status: SyncResult["status"] | "detached";
  coveredDates: IsoDate[];
  failures: CellFailure[];
};

export type DaysResult = { sync: SyncSummary; days: DayView[] };

export type CacheHealth = Record<
  DataType,
  { lastSyncedAt: string | null; ttlMs: number; isStale: boolean }
>;

export type SchoolDataServiceDeps = {
  engine: ISyncEngine;
  store: ICacheStore;
  ttlMs: Record<DataType, number>;
  sections: SectionBounds;
  maxRangeDays: number;
  readTimeoutMs: number;
  now?: () => Date;
};

export class SchoolDataService extends ServiceBase {
  private readonly now: () => Date;

  constructor(private readonly deps: SchoolDataServiceDeps) {
    super({ service: "schooldata" });
    this.now = deps.now ?? (() => new Date());
  }

  /** Externally requested sync: validated against the max span first. */
  async ensureSynced(range: DateRange, opts: { signal?: AbortSignal } = {}): Promise<SyncResult> {
    validateRequestedRange(range, this.deps.maxRangeDays);
    return this.deps.engine.ensureSynced(range, opts);
  }

  async readCached(dataType: DataType, range: DateRange, section?: Section): Promise<CacheRecord[]> {
    validateRequestedRange(range, this.deps.maxRangeDays);
    if (section) this.assertSection(section);
    return this.deps.store.readRange(dataType, range, section);
  }

  async readDays(range: DateRange, section?: Section): Promise<DayView[]> {
    validateRequestedRange(range, this.deps.maxRangeDays);
    if (section) this.assertSection(section);

    const byType = await Promise.all(
      DATA_TYPES.map(async (dt) => {
        const records = await this.deps.store.readRange(dt, range, dt === "timetable" ? section : undefined);
        return [dt, new Map(records.map((r) => [cacheKeyId(r), r.payload]))] as const;
      })
    );
    const cells = new Map(byType);
    const lookup = (dt: DataType, id: string) => cells.get(dt)?.get(id);
    const sections = section ? [section] : allSections(this.deps.sections);

    return eachDate(range).map((date) => ({
      date,
      meal: toCellView(lookup("meal", cacheKeyId(dateKey("meal", date))), PAYLOAD_SCHEMAS.meal),
      schedule: toCellView(
        lookup("schedule", cacheKeyId(dateKey("schedule", date))),
        PAYLOAD_SCHEMAS.schedule
      ),
      weather: toCellView(lookup("weather", cacheKeyId(dateKey("weather", date))), PAYLOAD_SCHEMAS.weather),
      waterTemperature: toCellView(
        lookup("waterTemperature", cacheKeyId(dateKey("waterTemperature", date))),
        PAYLOAD_SCHEMAS.waterTemperature
      ),
      timetable: sections.map((s) => ({
        ...s,
        cell: toCellView(lookup("timetable", cacheKeyId(sectionKey(date, s))), PAYLOAD_SCHEMAS.timetable),
      })),
    }));
  }

  /**
   * Sync (waiting at most readTimeoutMs, or until `signal` aborts) and read back.
   * Detaching is not an error: the days are served from whatever is cached.
   */
  async getDays(
    range: DateRange,
    section?: Section,
    opts: { signal?: AbortSignal } = {}
  ): Promise<DaysResult> {
    validateRequestedRange(range, this.deps.maxRangeDays);
    if (section) this.assertSection(section);

    const timeout = AbortSignal.timeout(this.deps.readTimeoutMs);
    const signal = opts.signal ? AbortSignal.any([timeout, opts.signal]) : timeout;

    let sync: SyncSummary;
    try {
      const result = await this.deps.engine.ensureSynced(range, { signal });
      sync = { status: result.status, coveredDates: result.coveredDates, failures: result.failures };
    } catch (err) {
      if (!(err instanceof SyncDetachedError)) throw err;
      this.log.warn(
        { start: range.start, end: range.end, timedOut: timeout.aborted },
        "read detached from sync; serving cached data"
      );
      sync = { status: "detached", coveredDates: [], failures: [] };
    }

    try {
      return { sync, days: await this.readDays(range, section) };
    } catch (err) {
      if (err instanceof StoreError) {
        throw new ServiceUnavailableError(`cache unavailable: ${err.message}`);
      }
      throw err;
    }
  }

  async healthcheck(): Promise<CacheHealth> {
    const now = this.now();
    const [meal, schedule, timetable, weather, waterTemperature] = await Promise.all([
      this.typeHealth("meal", now),
      this.typeHealth("schedule", now),
      this.typeHealth("timetable", now),
      this.typeHealth("weather", now),
      this.typeHealth("waterTemperature", now),
    ]);
    return { meal, schedule, timetable, weather, waterTemperature };
  }

  private async typeHealth(dataType: DataType, now: Date): Promise<CacheHealth[DataType]> {
    const ttlMs = this.deps.ttlMs[dataType];
    const last = await this.deps.store.latestSyncedAt(dataType);
    return {
      lastSyncedAt: last ? last.toISOString() : null,
      ttlMs,
      isStale: last === null || !isFresh(last, now, ttlMs),
    };
  }

  private assertSection(section: Section): void {
    if (!withinBounds(section, this.deps.sections)) {
      throw new RangeValidationError(
        `section ${section.grade}-${section.classNo} is outside ${this.deps.sections.grades} grades × ${this.deps.sections.classes} classes`
      );
    }
  }
}
