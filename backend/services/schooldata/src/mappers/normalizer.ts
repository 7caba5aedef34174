// backend/services/schooldata/src/mappers/normalizer.ts
/**
 * Pure mapping RawRecord → cache cell. No I/O.
 * - Holidays and empty results become Absent; unparsable numbers become null.
 * - Shapes it does not recognize throw NormalizationError (that cell only).
 */

import type { RawRecord } from "../connectors/connector.types";
import {
  dateKey,
  sectionKey,
  type AnyCellValue,
  type CacheKey,
} from "../contracts/cache.contract";
import type { DataType } from "../contracts/dataType";
import { NormalizationError } from "../errors";
import { mealToCell } from "./meal.mapper";
import { scheduleToCell } from "./schedule.mapper";
import { timetableToCell } from "./timetable.mapper";
import { weatherToCell } from "./weather.mapper";
import { waterTemperatureToCell } from "./waterTemperature.mapper";

export type NormalizeOptions = {
  /** Dishes containing any of these get the highlight mark. */
  highlightKeywords: readonly string[];
};

export type NormalizedCell = { key: CacheKey; value: AnyCellValue };

function keyOf(raw: RawRecord): CacheKey {
  if (raw.dataType !== "timetable") return dateKey(raw.dataType, raw.date);
  if (raw.grade === undefined || raw.classNo === undefined) {
    throw new NormalizationError(raw.dataType, raw.date, "timetable record without grade/class");
  }
  return sectionKey(raw.date, { grade: raw.grade, classNo: raw.classNo });
}

function valueOf(raw: RawRecord, opts: NormalizeOptions): AnyCellValue {
  switch (raw.dataType) {
    case "meal":
      return mealToCell(raw, opts.highlightKeywords);
    case "schedule":
      return scheduleToCell(raw);
    case "timetable":
      return timetableToCell(raw);
    case "weather":
      return weatherToCell(raw);
    case "waterTemperature":
      return waterTemperatureToCell(raw);
  }
}

export function normalize(
  dataType: DataType,
  raw: RawRecord,
  opts: NormalizeOptions
): NormalizedCell {
  if (raw.dataType !== dataType) {
    throw new NormalizationError(
      dataType,
      raw.date,
      `record of type ${raw.dataType} handed to ${dataType} normalizer`
    );
  }
  return { key: keyOf(raw), value: valueOf(raw, opts) };
}
