// backend/services/schooldata/src/contracts/dataType.ts
import { z } from "zod";

export const DATA_TYPES = [
  "meal",
  "schedule",
  "timetable",
  "weather",
  "waterTemperature",
] as const;

export const zDataType = z.enum(DATA_TYPES);

export type DataType = z.infer<typeof zDataType>;

/** Data types whose cells are further keyed by (grade, classNo). */
export function isSectioned(dataType: DataType): boolean {
  return dataType === "timetable";
}
