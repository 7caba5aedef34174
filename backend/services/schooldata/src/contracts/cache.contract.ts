// backend/services/schooldata/src/contracts/cache.contract.ts
import { z } from "zod";
import type { DataType } from "./dataType";
import type { IsoDate } from "../utils/dates";

/**
 * Canonical cache contract (Zod-first).
 * - Every cell holds a CellValue: Present(payload) or Absent(reason).
 * - Stored reasons: "holiday" (provider marks a day off) and "noData"
 *   (provider returned nothing). "unavailable" only appears on read views
 *   for cells that have never been synced.
 */

export const zMealPayload = z.object({
  menus: z.array(
    z.object({
      name: z.string().min(1),
      allergies: z.array(z.number().int().min(1).max(18)),
    })
  ),
  calories: z.number().nullable(),
});

export const zSchedulePayload = z.object({
  entries: z.array(
    z.object({
      name: z.string().min(1),
      grades: z.array(z.number().int().min(1)),
    })
  ),
  summary: z.string(),
});

export const zTimetablePayload = z.object({
  periods: z.array(z.string()),
});

export const zSky = z.enum(["clear", "mostlyCloudy", "cloudy", "unknown"]);
export const zPrecipitation = z.enum([
  "none",
  "rain",
  "rainSnow",
  "snow",
  "shower",
  "unknown",
]);

export const zWeatherPayload = z.object({
  forecastAt: z.string(),
  firstHour: z.number().int().min(0).max(23),
  temperatureC: z.number().nullable(),
  minC: z.number().nullable(),
  maxC: z.number().nullable(),
  sky: zSky,
  precipitation: zPrecipitation,
  precipProbability: z.number().nullable(),
  humidity: z.number().nullable(),
});

export const zWaterTemperaturePayload = z.object({
  measuredAt: z.string(),
  temperatureC: z.number(),
  samples: z.number().int().min(1),
});

export type MealPayload = z.infer<typeof zMealPayload>;
export type SchedulePayload = z.infer<typeof zSchedulePayload>;
export type TimetablePayload = z.infer<typeof zTimetablePayload>;
export type WeatherPayload = z.infer<typeof zWeatherPayload>;
export type WaterTemperaturePayload = z.infer<typeof zWaterTemperaturePayload>;
export type Sky = z.infer<typeof zSky>;
export type Precipitation = z.infer<typeof zPrecipitation>;

export interface PayloadByType {
  meal: MealPayload;
  schedule: SchedulePayload;
  timetable: TimetablePayload;
  weather: WeatherPayload;
  waterTemperature: WaterTemperaturePayload;
}

export const PAYLOAD_SCHEMAS = {
  meal: zMealPayload,
  schedule: zSchedulePayload,
  timetable: zTimetablePayload,
  weather: zWeatherPayload,
  waterTemperature: zWaterTemperaturePayload,
} as const;

export type StoredAbsentReason = "holiday" | "noData";
export type AbsentReason = StoredAbsentReason | "unavailable";

export type Present<T> = { kind: "present"; value: T };
export type Absent<R extends AbsentReason = StoredAbsentReason> = {
  kind: "absent";
  reason: R;
};

/** What the store holds for a cell. */
export type CellValue<T> = Present<T> | Absent;

/** What read views expose for a cell. */
export type CellView<T> = Present<T> | Absent<AbsentReason>;

export type AnyPayload = PayloadByType[DataType];
export type AnyCellValue = CellValue<AnyPayload>;

export const zStoredAbsent = z.object({
  kind: z.literal("absent"),
  reason: z.enum(["holiday", "noData"]),
});

export function present<T>(value: T): Present<T> {
  return { kind: "present", value };
}

export function absent(reason: StoredAbsentReason): Absent {
  return { kind: "absent", reason };
}

export const UNAVAILABLE: Absent<"unavailable"> = { kind: "absent", reason: "unavailable" };

export type Section = { grade: number; classNo: number };

/** Full key of a cache cell. grade/classNo are null for unsectioned types. */
export type CacheKey = {
  dataType: DataType;
  date: IsoDate;
  grade: number | null;
  classNo: number | null;
};

export type CacheRecord = CacheKey & {
  payload: AnyCellValue;
  syncedAt: Date;
};

/** Deterministic string id; doubles as the Mongo _id. */
export function cacheKeyId(key: CacheKey): string {
  return key.grade !== null && key.classNo !== null
    ? `${key.dataType}:${key.date}:${key.grade}:${key.classNo}`
    : `${key.dataType}:${key.date}`;
}

export function dateKey(dataType: DataType, date: IsoDate): CacheKey {
  return { dataType, date, grade: null, classNo: null };
}

export function sectionKey(date: IsoDate, section: Section): CacheKey {
  return { dataType: "timetable", date, grade: section.grade, classNo: section.classNo };
}

const zPresentEnvelope = z.object({ kind: z.literal("present"), value: z.unknown() });

/**
 * Validate a stored payload against the canonical schema of its data type.
 * Returns null when it does not match (e.g. written by an older version).
 */
export function parseCellValue(dataType: DataType, raw: unknown): AnyCellValue | null {
  const abs = zStoredAbsent.safeParse(raw);
  if (abs.success) return abs.data;
  const env = zPresentEnvelope.safeParse(raw);
  if (!env.success) return null;
  const value = PAYLOAD_SCHEMAS[dataType].safeParse(env.data.value);
  return value.success ? present(value.data) : null;
}

/** Narrow a stored cell to one payload type for read views. */
export function toCellView<T>(cell: AnyCellValue | undefined, schema: z.ZodType<T>): CellView<T> {
  if (!cell) return UNAVAILABLE;
  if (cell.kind === "absent") return cell;
  const r = schema.safeParse(cell.value);
  return r.success ? present(r.data) : UNAVAILABLE;
}
