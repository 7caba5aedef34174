// backend/services/schooldata/src/mappers/schedule.mapper.ts
import { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import { absent, present, type CellValue, type SchedulePayload } from "../contracts/cache.contract";
import { parseRows } from "./rows";

/** Marker event the provider emits for every no-school Saturday. */
export const SATURDAY_OFF = "토요휴업일";

const GRADE_FLAGS = [
  "ONE_GRADE_EVENT_YN",
  "TW_GRADE_EVENT_YN",
  "THREE_GRADE_EVENT_YN",
  "FR_GRADE_EVENT_YN",
  "FIV_GRADE_EVENT_YN",
  "SIX_GRADE_EVENT_YN",
] as const;

const zScheduleRow = z
  .object({
    AA_YMD: z.string(),
    EVENT_NM: z.string(),
    ONE_GRADE_EVENT_YN: z.string().optional(),
    TW_GRADE_EVENT_YN: z.string().optional(),
    THREE_GRADE_EVENT_YN: z.string().optional(),
    FR_GRADE_EVENT_YN: z.string().optional(),
    FIV_GRADE_EVENT_YN: z.string().optional(),
    SIX_GRADE_EVENT_YN: z.string().optional(),
  })
  .passthrough();

type Entry = SchedulePayload["entries"][number];

function summaryLine(e: Entry): string {
  if (!e.grades.length) return e.name;
  return `${e.name}(${e.grades.map((g) => `${g}학년`).join(", ")})`;
}

export function scheduleToCell(raw: RawRecord): CellValue<SchedulePayload> {
  const rows = parseRows(raw, zScheduleRow);

  let sawSaturdayOff = false;
  const entries: Entry[] = [];
  for (const row of rows) {
    const name = row.EVENT_NM.trim();
    if (name === SATURDAY_OFF) {
      sawSaturdayOff = true;
      continue;
    }
    if (!name) continue;
    const grades = GRADE_FLAGS.flatMap((flag, i) => (row[flag] === "Y" ? [i + 1] : []));
    entries.push({ name, grades });
  }

  if (!entries.length) return absent(sawSaturdayOff ? "holiday" : "noData");
  return present({ entries, summary: entries.map(summaryLine).join("\n") });
}
