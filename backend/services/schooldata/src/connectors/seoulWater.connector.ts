// backend/services/schooldata/src/connectors/seoulWater.connector.ts
/**
 * Han river water-quality connector (hourly measurements).
 * The endpoint serves the most recent rows only; rows are grouped by
 * measurement date (YMD) and filtered to the requested range. Coverage is
 * the span of measurement dates in the response.
 */

import { z } from "zod";
import { ServiceBase } from "@shared/base/ServiceBase";
import type { DataType } from "../contracts/dataType";
import { UpstreamError } from "../errors";
import { fromCompact, inRange, intersect, spanOf, type DateRange } from "../utils/dates";
import type { FetchResult, IConnector, RawRecord } from "./connector.types";
import type { UpstreamHttp } from "./upstreamHttp";

const SERVICE = "WPOSInformationTime";
export const SEOUL_ROW_LIMIT = 48;

const zResult = z.object({ CODE: z.string(), MESSAGE: z.string().optional() });
const zEnvelope = z.union([
  z.object({
    [SERVICE]: z.object({
      RESULT: zResult.optional(),
      row: z.array(z.unknown()).optional(),
    }),
  }),
  z.object({ RESULT: zResult }),
]);
const zRowDate = z.object({ YMD: z.union([z.string(), z.number()]) }).passthrough();

export type SeoulWaterConnectorOptions = {
  http: UpstreamHttp;
  baseUrl: string;
  token: string;
};

export class SeoulWaterConnector extends ServiceBase implements IConnector {
  readonly provider = "seoul";
  readonly dataTypes: readonly DataType[] = ["waterTemperature"];
  readonly maxSpanDays = 62;

  constructor(private readonly opts: SeoulWaterConnectorOptions) {
    super({ service: "schooldata", context: { provider: "seoul" } });
  }

  async fetch(dataType: DataType, range: DateRange): Promise<FetchResult> {
    if (dataType !== "waterTemperature") {
      throw new UpstreamError("permanent", this.provider, `unsupported data type: ${dataType}`);
    }

    const url = `${this.opts.baseUrl}/${encodeURIComponent(this.opts.token)}/json/${SERVICE}/1/${SEOUL_ROW_LIMIT}/`;
    const body = await this.opts.http.getJson(url);

    const env = zEnvelope.safeParse(body);
    if (!env.success) {
      throw new UpstreamError("transient", this.provider, `unexpected ${SERVICE} envelope`);
    }

    const data = env.data;
    const result = "RESULT" in data ? data.RESULT : data[SERVICE].RESULT;
    if (result) {
      const kind = classifySeoulCode(result.CODE);
      if (kind === "noData") return { records: [], covered: null };
      if (kind !== "ok") {
        throw new UpstreamError(kind, this.provider, `${result.CODE}: ${result.MESSAGE ?? ""}`.trim(), {
          providerCode: result.CODE,
        });
      }
    }
    const rows = "RESULT" in data ? [] : data[SERVICE].row ?? [];

    const byDate = new Map<string, unknown[]>();
    const measured = new Set<string>();
    for (const row of rows) {
      const parsed = zRowDate.safeParse(row);
      if (!parsed.success) continue;
      const date = fromCompact(String(parsed.data.YMD));
      if (!date) continue;
      measured.add(date);
      if (!inRange(date, range)) continue;
      const list = byDate.get(date) ?? [];
      list.push(row);
      byDate.set(date, list);
    }

    this.log.debug({ rows: rows.length, dates: byDate.size }, "water measurements fetched");
    const span = spanOf(measured);
    return {
      records: [...byDate.entries()].map(
        ([date, dayRows]): RawRecord => ({ dataType: "waterTemperature", date, rows: dayRows })
      ),
      covered: span && intersect(span, range),
    };
  }
}

export function classifySeoulCode(code: string): "ok" | "noData" | "transient" | "permanent" {
  if (code === "INFO-000") return "ok";
  if (code === "INFO-200") return "noData";
  if (/^ERROR-5\d\d$/.test(code)) return "transient";
  return "permanent";
}
