// backend/services/schooldata/src/connectors/connector.types.ts
import type { DataType } from "../contracts/dataType";
import type { DateRange, IsoDate } from "../utils/dates";

/**
 * Provider rows belonging to one cache cell, still unvalidated.
 * grade/classNo are set only for sectioned data types.
 */
export type RawRecord = {
  dataType: DataType;
  date: IsoDate;
  grade?: number;
  classNo?: number;
  rows: unknown[];
};

/**
 * What one fetch returned.
 * - covered: the part of the requested range the provider answered for; a
 *   date inside it with no record has no data upstream. Short-horizon feeds
 *   (latest forecast, latest measurements) cover only the dates their
 *   response spans; null when the response spans nothing.
 */
export type FetchResult = {
  records: RawRecord[];
  covered: DateRange | null;
};

/**
 * One upstream provider family.
 * - fetch() is idempotent and keeps no cache of its own.
 * - Failures are thrown as UpstreamError (transient | permanent).
 * - Callers never pass a range wider than maxSpanDays.
 */
export interface IConnector {
  readonly provider: string;
  readonly dataTypes: readonly DataType[];
  readonly maxSpanDays: number;
  fetch(dataType: DataType, range: DateRange): Promise<FetchResult>;
}
