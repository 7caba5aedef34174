// backend/services/schooldata/src/sync/SyncEngine.ts
/**
 * Purpose:
 * - Make a date range fresh in the cache: plan stale/missing cells, fetch them
 *   once per sub-range, normalize, persist, report.
 *
 * Invariants:
 * - A (dataType, date) cell has at most one in-flight fetch process-wide.
 *   Planning (store read → in-flight lookup → registration) runs under one
 *   mutex, so two passes can never both decide to fetch the same cell.
 * - Callers attached to the same operation see the same outcome.
 * - The store is written only by the persisting step, with one batch of
 *   single-document upserts per operation.
 * - Cell- and pass-level failures are reported in SyncResult, never thrown.
 *   ensureSynced throws only RangeValidationError (bad range) and
 *   SyncDetachedError (caller aborted).
 */

import { ServiceBase } from "@shared/base/ServiceBase";
import type { IBoundLogger } from "@shared/logger/Logger";
import type { RetryPolicy } from "../config";
import type { FetchResult, IConnector, RawRecord } from "../connectors/connector.types";
import type { ConnectorRegistry } from "../connectors/connectorRegistry";
import {
  absent,
  cacheKeyId,
  dateKey,
  sectionKey,
  type CacheKey,
} from "../contracts/cache.contract";
import { DATA_TYPES, type DataType } from "../contracts/dataType";
import { SyncDetachedError, UpstreamError } from "../errors";
import { normalize, type NormalizeOptions, type NormalizedCell } from "../mappers/normalizer";
import type { ICacheStore } from "../repo/cache.store.types";
import { coalesceRuns, eachDate, inRange, type DateRange, type IsoDate } from "../utils/dates";
import { expectedKeys, staleDates, withinBounds, type SectionBounds } from "./freshness";
import { InFlightTable, type InFlightOperation } from "./InFlightTable";
import { Mutex } from "./Mutex";
import { assertOrderedRange } from "./rangeValidation";
import type {
  CellFailure,
  EnsureSyncedOptions,
  ISyncEngine,
  FailureReason,
  OperationOutcome,
  SyncResult,
} from "./sync.types";
import { withRetry, type Sleep } from "./withRetry";

export type SyncEngineDeps = {
  store: ICacheStore;
  connectors: ConnectorRegistry;
  ttlMs: Record<DataType, number>;
  sections: SectionBounds;
  retry: RetryPolicy;
  normalize: NormalizeOptions;
  now?: () => Date;
  sleep?: Sleep;
};

/** What one caller waits on: an operation, and which of its dates it cares about. */
type Wait = { op: InFlightOperation; dates: Set<IsoDate> };

type Plan = { waits: Wait[]; failures: CellFailure[] };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SyncEngine extends ServiceBase implements ISyncEngine {
  private readonly planning = new Mutex();
  private readonly inFlight = new InFlightTable();
  private readonly now: () => Date;
  private nextOpId = 1;
  /** Operations launched and not yet released from the in-flight table. */
  private readonly settling = new Set<Promise<void>>();

  constructor(private readonly deps: SyncEngineDeps) {
    super({ service: "schooldata" });
    this.now = deps.now ?? (() => new Date());
  }

  /** Number of (dataType, date) cells currently being fetched. */
  get inFlightCells(): number {
    return this.inFlight.size;
  }

  /** Resolves once every launched operation has persisted and been released. */
  async drain(): Promise<void> {
    while (this.settling.size) {
      await Promise.all([...this.settling]);
    }
  }

  async ensureSynced(range: DateRange, opts: EnsureSyncedOptions = {}): Promise<SyncResult> {
    assertOrderedRange(range);
    if (opts.signal?.aborted) throw new SyncDetachedError();

    const dataTypes = [...new Set(opts.dataTypes ?? DATA_TYPES)];
    const log = this.bindLog({ start: range.start, end: range.end });

    const plan = await this.planning.runExclusive(() => this.plan(range, dataTypes, log));
    if (!plan.waits.length) {
      return this.finish(range, plan.failures, log);
    }

    const shared = Promise.all(
      plan.waits.map(async (w) => {
        const outcome = await w.op.promise;
        return outcome.failures.filter((f) => w.dates.has(f.date));
      })
    );
    const opFailures = await detachable(shared, opts.signal);
    return this.finish(range, [...plan.failures, ...opFailures.flat()], log);
  }

  // ── Planning (runs under the mutex) ────────────────────────────────────────

  private async plan(range: DateRange, dataTypes: DataType[], log: IBoundLogger): Promise<Plan> {
    const waits: Wait[] = [];
    const failures: CellFailure[] = [];

    for (const dataType of dataTypes) {
      const connector = this.deps.connectors.forType(dataType);

      let stale: IsoDate[];
      try {
        const records = await this.deps.store.readRange(dataType, range);
        stale = staleDates(dataType, range, records, {
          now: this.now(),
          ttlMs: this.deps.ttlMs[dataType],
          bounds: this.deps.sections,
        });
      } catch (err) {
        log.error({ dataType, err: log.serializeError(err) }, "planning read failed; type skipped");
        failures.push(...failDates(dataType, eachDate(range), "store", errorMessage(err)));
        continue;
      }
      if (!stale.length) continue;

      const attached = new Map<InFlightOperation, Set<IsoDate>>();
      const toFetch: IsoDate[] = [];
      for (const date of stale) {
        const op = this.inFlight.find(dataType, date);
        if (!op) {
          toFetch.push(date);
          continue;
        }
        const dates = attached.get(op) ?? new Set<IsoDate>();
        dates.add(date);
        attached.set(op, dates);
      }

      for (const [op, dates] of attached) waits.push({ op, dates });
      const subRanges = coalesceRuns(toFetch, connector.maxSpanDays);
      for (const sub of subRanges) {
        waits.push({ op: this.launch(dataType, sub, connector), dates: new Set(eachDate(sub)) });
      }

      log.debug(
        { dataType, stale: stale.length, attachedOps: attached.size, launchedOps: subRanges.length },
        "planned"
      );
    }
    return { waits, failures };
  }

  private launch(dataType: DataType, range: DateRange, connector: IConnector): InFlightOperation {
    const id = this.nextOpId++;
    const promise = this.runOperation(id, dataType, range, connector);
    const op: InFlightOperation = { id, dataType, range, promise };
    this.inFlight.register(op, eachDate(range));
    // Released under the planning mutex: a pass that read the store before this
    // operation persisted still finds it registered and attaches to it.
    const released: Promise<void> = promise
      .then(() => this.planning.runExclusive(async () => this.inFlight.release(op)))
      .finally(() => this.settling.delete(released));
    this.settling.add(released);
    return op;
  }

  // ── Fetch → normalize → persist (one operation) ────────────────────────────

  private async runOperation(
    id: number,
    dataType: DataType,
    range: DateRange,
    connector: IConnector
  ): Promise<OperationOutcome> {
    const log = this.bindLog({
      op: id,
      dataType,
      provider: connector.provider,
      start: range.start,
      end: range.end,
    });
    const dates = eachDate(range);

    let fetched: FetchResult;
    try {
      fetched = await withRetry(() => connector.fetch(dataType, range), {
        policy: this.deps.retry,
        label: `${connector.provider}.${dataType}`,
        log,
        sleep: this.deps.sleep,
        isRetryable: (err) => err instanceof UpstreamError && err.isTransient,
        retryAfterMs: (err) => (err instanceof UpstreamError ? err.retryAfterMs : undefined),
      });
    } catch (err) {
      log.warn({ err: log.serializeError(err) }, "fetch failed; sub-range left as it was");
      return { written: 0, failures: failDates(dataType, dates, "upstream", errorMessage(err)) };
    }

    const { cells, failures } = this.normalizeAll(dataType, range, fetched, log);

    let written: number;
    try {
      written = await this.deps.store.upsertMany(
        cells.map((c) => ({ key: c.key, payload: c.value })),
        this.now()
      );
    } catch (err) {
      log.error({ err: log.serializeError(err) }, "persist failed");
      return { written: 0, failures: failDates(dataType, dates, "store", errorMessage(err)) };
    }

    log.info(
      { records: fetched.records.length, covered: fetched.covered, written, failed: failures.length },
      "sync operation complete"
    );
    return { written, failures };
  }

  /**
   * Normalize each raw record; a failing record fails its cell only.
   * Every expected cell inside the connector's coverage that got no record is
   * filled with Absent("noData"). Dates outside the coverage keep whatever
   * the cache holds.
   */
  private normalizeAll(
    dataType: DataType,
    range: DateRange,
    { records: raws, covered }: FetchResult,
    log: IBoundLogger
  ): { cells: NormalizedCell[]; failures: CellFailure[] } {
    const cells = new Map<string, NormalizedCell>();
    const failed = new Set<string>();
    const failures: CellFailure[] = [];

    for (const raw of raws) {
      if (!inRange(raw.date, range)) {
        log.debug({ date: raw.date }, "record outside sub-range dropped");
        continue;
      }
      if (
        raw.grade !== undefined &&
        raw.classNo !== undefined &&
        !withinBounds({ grade: raw.grade, classNo: raw.classNo }, this.deps.sections)
      ) {
        log.debug({ date: raw.date, grade: raw.grade, classNo: raw.classNo }, "section out of bounds dropped");
        continue;
      }

      try {
        const cell = normalize(dataType, raw, this.deps.normalize);
        cells.set(cacheKeyId(cell.key), cell);
      } catch (err) {
        const key = rawKey(raw);
        failed.add(cacheKeyId(key));
        failures.push({
          dataType,
          date: raw.date,
          ...(raw.grade !== undefined ? { grade: raw.grade } : {}),
          ...(raw.classNo !== undefined ? { classNo: raw.classNo } : {}),
          reason: "normalization",
          detail: errorMessage(err),
        });
        log.warn({ date: raw.date, err: log.serializeError(err) }, "record skipped: not normalizable");
      }
    }

    for (const date of covered ? eachDate(covered).filter((d) => inRange(d, range)) : []) {
      for (const key of expectedKeys(dataType, date, this.deps.sections)) {
        const id = cacheKeyId(key);
        if (!cells.has(id) && !failed.has(id)) cells.set(id, { key, value: absent("noData") });
      }
    }

    return { cells: [...cells.values()], failures };
  }

  private finish(range: DateRange, failures: CellFailure[], log: IBoundLogger): SyncResult {
    const failedDates = new Set(failures.map((f) => f.date));
    const coveredDates = eachDate(range).filter((d) => !failedDates.has(d));
    const status = failures.length ? "partialFailure" : "done";
    if (status === "partialFailure") {
      log.warn({ failures: failures.length, covered: coveredDates.length }, "sync pass partially failed");
    } else {
      log.debug({ covered: coveredDates.length }, "sync pass done");
    }
    return { status, range, coveredDates, failures };
  }
}

function rawKey(raw: RawRecord): CacheKey {
  if (raw.grade !== undefined && raw.classNo !== undefined) {
    return sectionKey(raw.date, { grade: raw.grade, classNo: raw.classNo });
  }
  return dateKey(raw.dataType, raw.date);
}

function failDates(
  dataType: DataType,
  dates: IsoDate[],
  reason: FailureReason,
  detail: string
): CellFailure[] {
  return dates.map((date) => ({ dataType, date, reason, detail }));
}

/** Resolve with `p`, or reject with SyncDetachedError as soon as `signal` aborts. */
function detachable<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new SyncDetachedError());
      return;
    }
    const onAbort = () => reject(new SyncDetachedError());
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
