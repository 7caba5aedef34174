// backend/services/schooldata/src/connectors/neis.connector.ts
/**
 * Education-information hub connector: meal, schedule, timetable.
 *
 * Envelope (success):
 *   { "<service>": [ { head: [ {list_total_count}, {RESULT:{CODE,MESSAGE}} ] }, { row: [...] } ] }
 * Envelope (no data / error):
 *   { RESULT: { CODE, MESSAGE } }
 *
 * Result codes:
 * - INFO-000 ok, INFO-200 no data
 * - ERROR-337 (daily traffic cap), ERROR-5xx/6xx → transient
 * - everything else (bad key, missing params, no such service) → permanent
 */

import { z } from "zod";
import { ServiceBase } from "@shared/base/ServiceBase";
import type { DataType } from "../contracts/dataType";
import { UpstreamError } from "../errors";
import { fromCompact, inRange, toCompact, type DateRange } from "../utils/dates";
import type { FetchResult, IConnector, RawRecord } from "./connector.types";
import type { UpstreamHttp } from "./upstreamHttp";

export const NEIS_PAGE_SIZE = 1000;
export const NEIS_MAX_PAGES = 50;

type NeisEndpoint = {
  service: string;
  dateField: string;
  rangeParams: (range: DateRange) => Record<string, string>;
  extraParams?: Record<string, string>;
};

const ENDPOINTS: Partial<Record<DataType, NeisEndpoint>> = {
  meal: {
    service: "mealServiceDietInfo",
    dateField: "MLSV_YMD",
    rangeParams: (r) => ({ MLSV_FROM_YMD: toCompact(r.start), MLSV_TO_YMD: toCompact(r.end) }),
    // lunch only
    extraParams: { MMEAL_SC_CODE: "2" },
  },
  schedule: {
    service: "SchoolSchedule",
    dateField: "AA_YMD",
    rangeParams: (r) => ({ AA_FROM_YMD: toCompact(r.start), AA_TO_YMD: toCompact(r.end) }),
  },
  timetable: {
    service: "hisTimetable",
    dateField: "ALL_TI_YMD",
    rangeParams: (r) => ({ TI_FROM_YMD: toCompact(r.start), TI_TO_YMD: toCompact(r.end) }),
  },
};

const zResult = z.object({ CODE: z.string(), MESSAGE: z.string().optional() });
const zBareResult = z.object({ RESULT: zResult });
const zServiceBody = z.tuple([
  z.object({ head: z.array(z.record(z.unknown())) }),
  z.object({ row: z.array(z.unknown()) }),
]);
const zRow = z.record(z.unknown());

export type NeisConnectorOptions = {
  http: UpstreamHttp;
  baseUrl: string;
  apiKey: string;
  officeCode: string;
  schoolCode: string;
};

export class NeisConnector extends ServiceBase implements IConnector {
  readonly provider = "neis";
  readonly dataTypes: readonly DataType[] = ["meal", "schedule", "timetable"];
  readonly maxSpanDays = 31;

  constructor(private readonly opts: NeisConnectorOptions) {
    super({ service: "schooldata", context: { provider: "neis" } });
  }

  /** The hub answers for any date asked, so the whole range is covered. */
  async fetch(dataType: DataType, range: DateRange): Promise<FetchResult> {
    const endpoint = ENDPOINTS[dataType];
    if (!endpoint) {
      throw new UpstreamError("permanent", this.provider, `unsupported data type: ${dataType}`);
    }

    const rows = await this.fetchAllRows(endpoint, range);
    const records = groupRows(dataType, endpoint.dateField, rows, range);
    this.log.debug(
      { dataType, start: range.start, end: range.end, rows: rows.length, records: records.length },
      "neis fetch complete"
    );
    return { records, covered: range };
  }

  private async fetchAllRows(endpoint: NeisEndpoint, range: DateRange): Promise<unknown[]> {
    const all: unknown[] = [];
    for (let page = 1; ; page++) {
      const body = await this.opts.http.getJson(`${this.opts.baseUrl}/${endpoint.service}`, {
        KEY: this.opts.apiKey,
        Type: "json",
        pIndex: String(page),
        pSize: String(NEIS_PAGE_SIZE),
        ATPT_OFCDC_SC_CODE: this.opts.officeCode,
        SD_SCHUL_CODE: this.opts.schoolCode,
        ...endpoint.extraParams,
        ...endpoint.rangeParams(range),
      });
      const rows = this.parsePage(endpoint.service, body);
      all.push(...rows);
      if (rows.length < NEIS_PAGE_SIZE) return all;
      if (page === NEIS_MAX_PAGES) {
        // never hand back a truncated result
        throw new UpstreamError(
          "permanent",
          this.provider,
          `${endpoint.service}: more than ${NEIS_MAX_PAGES} pages of ${NEIS_PAGE_SIZE} rows`
        );
      }
    }
  }

  /** Rows of one page; [] for "no data". Throws UpstreamError for error codes. */
  private parsePage(service: string, body: unknown): unknown[] {
    const bare = zBareResult.safeParse(body);
    if (bare.success) {
      this.checkResult(bare.data.RESULT);
      return [];
    }

    const wrapped = z.object({ [service]: zServiceBody }).safeParse(body);
    if (!wrapped.success) {
      throw new UpstreamError("transient", this.provider, `unexpected ${service} envelope`);
    }
    const [head, rowPart] = wrapped.data[service];
    for (const h of head.head) {
      const result = zResult.safeParse(h.RESULT);
      if (result.success) this.checkResult(result.data);
    }
    return rowPart.row;
  }

  private checkResult(result: z.infer<typeof zResult>): void {
    const kind = classifyNeisCode(result.CODE);
    if (kind === "ok" || kind === "noData") return;
    throw new UpstreamError(kind, this.provider, `${result.CODE}: ${result.MESSAGE ?? ""}`.trim(), {
      providerCode: result.CODE,
    });
  }
}

export function classifyNeisCode(code: string): "ok" | "noData" | "transient" | "permanent" {
  if (code === "INFO-000") return "ok";
  if (code === "INFO-200") return "noData";
  if (code === "ERROR-337" || /^ERROR-[56]\d\d$/.test(code)) return "transient";
  return "permanent";
}

function readString(row: Record<string, unknown>, field: string): string | null {
  const v = row[field];
  if (typeof v === "string" && v.trim()) return v.trim();
  if (typeof v === "number") return String(v);
  return null;
}

function readInt(row: Record<string, unknown>, field: string): number | null {
  const s = readString(row, field);
  if (s === null || !/^\d+$/.test(s)) return null;
  return Number(s);
}

/**
 * Group provider rows into per-cell records. Rows whose date (or, for the
 * timetable, grade/class) cannot be read, or that fall outside the range,
 * are not attributable to any cell and are dropped.
 */
export function groupRows(
  dataType: DataType,
  dateField: string,
  rows: unknown[],
  range: DateRange
): RawRecord[] {
  const byKey = new Map<string, RawRecord>();
  for (const raw of rows) {
    const parsed = zRow.safeParse(raw);
    if (!parsed.success) continue;
    const row = parsed.data;

    const compact = readString(row, dateField);
    const date = compact ? fromCompact(compact) : null;
    if (!date || !inRange(date, range)) continue;

    let key = date;
    let section: { grade: number; classNo: number } | null = null;
    if (dataType === "timetable") {
      const grade = readInt(row, "GRADE");
      const classNo = readInt(row, "CLASS_NM");
      if (grade === null || classNo === null) continue;
      section = { grade, classNo };
      key = `${date}:${grade}:${classNo}`;
    }

    const existing = byKey.get(key);
    if (existing) {
      existing.rows.push(raw);
    } else {
      byKey.set(key, { dataType, date, ...(section ?? {}), rows: [raw] });
    }
  }
  return [...byKey.values()];
}
