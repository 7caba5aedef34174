// backend/services/schooldata/src/connectors/kmaWeather.connector.ts
/**
 * Short-term (village) forecast connector.
 *
 * The provider publishes at 02,05,08,11,14,17,20,23 h KST, available ~10 min
 * later. One call returns every forecast slot of the latest publication
 * (roughly three days ahead); items are grouped by forecast date and only
 * dates inside the requested range are returned. Coverage is the span of
 * forecast dates in the publication, so past dates are never reported as
 * empty.
 */

import { z } from "zod";
import { ServiceBase } from "@shared/base/ServiceBase";
import type { DataType } from "../contracts/dataType";
import { UpstreamError } from "../errors";
import {
  addDays,
  fromCompact,
  inRange,
  intersect,
  spanOf,
  toCompact,
  zonedParts,
  type DateRange,
} from "../utils/dates";
import type { FetchResult, IConnector, RawRecord } from "./connector.types";
import type { UpstreamHttp } from "./upstreamHttp";

const BASE_HOURS = [23, 20, 17, 14, 11, 8, 5, 2];
const PUBLISH_DELAY_MIN = 10;

const zEnvelope = z.object({
  response: z.object({
    header: z.object({ resultCode: z.string(), resultMsg: z.string().optional() }),
    body: z
      .object({
        items: z.union([z.object({ item: z.array(z.unknown()) }), z.literal("")]).optional(),
      })
      .optional(),
  }),
});

const zItemDate = z.object({ fcstDate: z.string() }).passthrough();

export type KmaWeatherConnectorOptions = {
  http: UpstreamHttp;
  baseUrl: string;
  apiKey: string;
  nx: number;
  ny: number;
  timeZone: string;
  now?: () => Date;
};

export class KmaWeatherConnector extends ServiceBase implements IConnector {
  readonly provider = "kma";
  readonly dataTypes: readonly DataType[] = ["weather"];
  readonly maxSpanDays = 62;
  private readonly now: () => Date;

  constructor(private readonly opts: KmaWeatherConnectorOptions) {
    super({ service: "schooldata", context: { provider: "kma" } });
    this.now = opts.now ?? (() => new Date());
  }

  async fetch(dataType: DataType, range: DateRange): Promise<FetchResult> {
    if (dataType !== "weather") {
      throw new UpstreamError("permanent", this.provider, `unsupported data type: ${dataType}`);
    }

    const { baseDate, baseTime } = latestBaseTime(this.now(), this.opts.timeZone);
    const body = await this.opts.http.getJson(`${this.opts.baseUrl}/getVilageFcst`, {
      serviceKey: this.opts.apiKey,
      pageNo: "1",
      numOfRows: "1000",
      dataType: "JSON",
      base_date: baseDate,
      base_time: baseTime,
      nx: String(this.opts.nx),
      ny: String(this.opts.ny),
    });

    const env = zEnvelope.safeParse(body);
    if (!env.success) {
      throw new UpstreamError("transient", this.provider, "unexpected forecast envelope");
    }
    const { header, body: payload } = env.data.response;
    const kind = classifyKmaCode(header.resultCode);
    if (kind === "noData") return { records: [], covered: null };
    if (kind !== "ok") {
      throw new UpstreamError(kind, this.provider, `${header.resultCode}: ${header.resultMsg ?? ""}`.trim(), {
        providerCode: header.resultCode,
      });
    }

    const items = payload?.items ? payload.items.item : [];
    const byDate = new Map<string, unknown[]>();
    const published = new Set<string>();
    for (const item of items) {
      const parsed = zItemDate.safeParse(item);
      if (!parsed.success) continue;
      const date = fromCompact(parsed.data.fcstDate);
      if (!date) continue;
      published.add(date);
      if (!inRange(date, range)) continue;
      const list = byDate.get(date) ?? [];
      list.push(item);
      byDate.set(date, list);
    }

    this.log.debug({ baseDate, baseTime, items: items.length, dates: byDate.size }, "forecast fetched");
    const span = spanOf(published);
    return {
      records: [...byDate.entries()].map(([date, rows]): RawRecord => ({ dataType: "weather", date, rows })),
      covered: span && intersect(span, range),
    };
  }
}

/** Latest publication the provider has made available at `at`. */
export function latestBaseTime(at: Date, timeZone: string): { baseDate: string; baseTime: string } {
  const { date, hour, minute } = zonedParts(at, timeZone);
  const minutes = hour * 60 + minute;
  const found = BASE_HOURS.find((h) => minutes >= h * 60 + PUBLISH_DELAY_MIN);
  if (found === undefined) {
    return { baseDate: toCompact(addDays(date, -1)), baseTime: "2300" };
  }
  return { baseDate: toCompact(date), baseTime: `${String(found).padStart(2, "0")}00` };
}

export function classifyKmaCode(code: string): "ok" | "noData" | "transient" | "permanent" {
  if (code === "00") return "ok";
  if (code === "03") return "noData";
  if (["01", "02", "04", "05", "22"].includes(code)) return "transient";
  return "permanent";
}
