// backend/services/schooldata/src/mappers/timetable.mapper.ts
import { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import { absent, present, type CellValue, type TimetablePayload } from "../contracts/cache.contract";
import { parseRows, toNumberOrNull } from "./rows";
import { SATURDAY_OFF } from "./schedule.mapper";

const zTimetableRow = z
  .object({
    ALL_TI_YMD: z.string(),
    PERIO: z.union([z.string(), z.number()]).optional(),
    ITRT_CNTNT: z.string().optional(),
  })
  .passthrough();

/** Rows of one (date, grade, class) cell → subjects ordered by period. */
export function timetableToCell(raw: RawRecord): CellValue<TimetablePayload> {
  const rows = parseRows(raw, zTimetableRow);

  let sawSaturdayOff = false;
  const slots: { period: number; subject: string }[] = [];
  for (const row of rows) {
    const subject = (row.ITRT_CNTNT ?? "").trim();
    if (subject === SATURDAY_OFF) {
      sawSaturdayOff = true;
      continue;
    }
    if (!subject) continue;
    slots.push({ period: toNumberOrNull(row.PERIO) ?? Number.MAX_SAFE_INTEGER, subject });
  }

  if (!slots.length) return absent(sawSaturdayOff ? "holiday" : "noData");
  // Array.prototype.sort is stable, so rows without a period keep provider order at the end.
  slots.sort((a, b) => a.period - b.period);
  return present({ periods: slots.map((s) => s.subject) });
}
