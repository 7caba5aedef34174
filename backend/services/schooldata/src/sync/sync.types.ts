// backend/services/schooldata/src/sync/sync.types.ts
import type { DataType } from "../contracts/dataType";
import type { DateRange, IsoDate } from "../utils/dates";

export type FailureReason = "upstream" | "normalization" | "store";

export type CellFailure = {
  dataType: DataType;
  date: IsoDate;
  grade?: number;
  classNo?: number;
  reason: FailureReason;
  detail: string;
};

export type SyncStatus = "done" | "partialFailure";

export type SyncResult = {
  status: SyncStatus;
  range: DateRange;
  /** Requested dates with no failed cell. */
  coveredDates: IsoDate[];
  failures: CellFailure[];
};

export type EnsureSyncedOptions = {
  /** Defaults to every data type. */
  dataTypes?: readonly DataType[];
  /** Aborting detaches this caller only; in-flight fetches keep running. */
  signal?: AbortSignal;
};

export type OperationOutcome = {
  written: number;
  failures: CellFailure[];
};

/** The engine surface the read path and scheduler depend on. */
export interface ISyncEngine {
  ensureSynced(range: DateRange, opts?: EnsureSyncedOptions): Promise<SyncResult>;
}
