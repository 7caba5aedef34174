// backend/services/schooldata/src/mappers/waterTemperature.mapper.ts
import { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import {
  absent,
  present,
  type CellValue,
  type WaterTemperaturePayload,
} from "../contracts/cache.contract";
import { parseRows, toNumberOrNull } from "./rows";

const PROVIDER_UTC_OFFSET = "+09:00";
const HOUR_MINUTE = /^([01]\d|2[0-3]):[0-5]\d$/;

const zMeasurementRow = z
  .object({
    YMD: z.union([z.string(), z.number()]),
    HR: z.string().optional(),
    WATT: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

/** Mean of the day's numeric samples, rounded to 2 decimals; latest sample time. */
export function waterTemperatureToCell(raw: RawRecord): CellValue<WaterTemperaturePayload> {
  const rows = parseRows(raw, zMeasurementRow);

  const temps = rows
    .map((r) => toNumberOrNull(r.WATT))
    .filter((t): t is number => t !== null);
  if (!temps.length) return absent("noData");

  const times = rows
    .map((r) => (r.HR ?? "").trim())
    .filter((hr) => HOUR_MINUTE.test(hr))
    .sort();
  const latest = times[times.length - 1] ?? "00:00";

  const mean = temps.reduce((sum, t) => sum + t, 0) / temps.length;
  return present({
    measuredAt: new Date(`${raw.date}T${latest}:00${PROVIDER_UTC_OFFSET}`).toISOString(),
    temperatureC: Math.round(mean * 100) / 100,
    samples: temps.length,
  });
}
