// backend/services/schooldata/src/mappers/weather.mapper.ts
import { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import {
  absent,
  present,
  type CellValue,
  type Precipitation,
  type Sky,
  type WeatherPayload,
} from "../contracts/cache.contract";
import { parseRows, toNumberOrNull } from "./rows";

/** Forecast times are published in KST. */
const PROVIDER_UTC_OFFSET = "+09:00";
const REPRESENTATIVE_TIME = "0900";

const zForecastItem = z
  .object({
    category: z.string(),
    fcstDate: z.string().regex(/^\d{8}$/),
    fcstTime: z.string().regex(/^\d{4}$/),
    fcstValue: z.union([z.string(), z.number()]),
  })
  .passthrough();

type ForecastItem = z.infer<typeof zForecastItem>;

const SKY: Record<string, Sky> = { "1": "clear", "3": "mostlyCloudy", "4": "cloudy" };
const PTY: Record<string, Precipitation> = {
  "0": "none",
  "1": "rain",
  "2": "rainSnow",
  "3": "snow",
  "4": "shower",
};

function slotInstant(fcstDate: string, fcstTime: string): string {
  const iso = `${fcstDate.slice(0, 4)}-${fcstDate.slice(4, 6)}-${fcstDate.slice(6, 8)}T${fcstTime.slice(0, 2)}:${fcstTime.slice(2, 4)}:00${PROVIDER_UTC_OFFSET}`;
  return new Date(iso).toISOString();
}

/**
 * Daily summary from the representative slot: 09:00 when forecast, else the
 * earliest slot that has a temperature. Min/max come from TMN/TMX of the day.
 */
export function weatherToCell(raw: RawRecord): CellValue<WeatherPayload> {
  const items = parseRows(raw, zForecastItem);

  const temps = items
    .filter((i) => i.category === "TMP")
    .sort((a, b) => a.fcstTime.localeCompare(b.fcstTime));
  const rep = temps.find((i) => i.fcstTime === REPRESENTATIVE_TIME) ?? temps[0];
  if (!rep) return absent("noData");

  const atSlot = (category: string): ForecastItem | undefined =>
    items.find((i) => i.fcstTime === rep.fcstTime && i.category === category);
  const daily = (category: string): number | null =>
    toNumberOrNull(items.find((i) => i.category === category)?.fcstValue);

  const skyCode = atSlot("SKY")?.fcstValue;
  const ptyCode = atSlot("PTY")?.fcstValue;

  return present({
    forecastAt: slotInstant(rep.fcstDate, rep.fcstTime),
    firstHour: Number(rep.fcstTime.slice(0, 2)),
    temperatureC: toNumberOrNull(rep.fcstValue),
    minC: daily("TMN"),
    maxC: daily("TMX"),
    sky: skyCode === undefined ? "unknown" : SKY[String(skyCode)] ?? "unknown",
    precipitation: ptyCode === undefined ? "unknown" : PTY[String(ptyCode)] ?? "unknown",
    precipProbability: toNumberOrNull(atSlot("POP")?.fcstValue),
    humidity: toNumberOrNull(atSlot("REH")?.fcstValue),
  });
}
