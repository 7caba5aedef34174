// backend/services/schooldata/test/helpers/memoryCacheStore.ts
import {
  cacheKeyId,
  type AnyCellValue,
  type CacheKey,
  type CacheRecord,
  type Section,
} from "../../src/contracts/cache.contract";
import type { DataType } from "../../src/contracts/dataType";
import { StoreError } from "../../src/errors";
import type { CacheWrite, ICacheStore } from "../../src/repo/cache.store.types";
import { inRange, type DateRange } from "../../src/utils/dates";

type StoreOp = "upsert" | "upsertMany" | "readRange" | "latestSyncedAt" | "freshnessOf";

/** In-process ICacheStore with call counters and failure injection. */
export class MemoryCacheStore implements ICacheStore {
  readonly records = new Map<string, CacheRecord>();
  readonly calls: Record<StoreOp, number> = {
    upsert: 0,
    upsertMany: 0,
    readRange: 0,
    latestSyncedAt: 0,
    freshnessOf: 0,
  };
  private readonly failing = new Set<StoreOp>();

  failOn(op: StoreOp): this {
    this.failing.add(op);
    return this;
  }

  heal(op: StoreOp): this {
    this.failing.delete(op);
    return this;
  }

  async ensureIndexes(): Promise<void> {}

  async upsert(key: CacheKey, payload: AnyCellValue, syncedAt: Date): Promise<void> {
    this.hit("upsert");
    this.put(key, payload, syncedAt);
  }

  async upsertMany(entries: CacheWrite[], syncedAt: Date): Promise<number> {
    this.hit("upsertMany");
    for (const e of entries) this.put(e.key, e.payload, syncedAt);
    return entries.length;
  }

  async readRange(dataType: DataType, range: DateRange, section?: Section): Promise<CacheRecord[]> {
    this.hit("readRange");
    return [...this.records.values()]
      .filter(
        (r) =>
          r.dataType === dataType &&
          inRange(r.date, range) &&
          (!section || (r.grade === section.grade && r.classNo === section.classNo))
      )
      .sort(
        (a, b) =>
          a.date.localeCompare(b.date) || (a.grade ?? 0) - (b.grade ?? 0) || (a.classNo ?? 0) - (b.classNo ?? 0)
      );
  }

  async freshnessOf(key: CacheKey): Promise<Date | null> {
    this.hit("freshnessOf");
    return this.records.get(cacheKeyId(key))?.syncedAt ?? null;
  }

  async latestSyncedAt(dataType: DataType): Promise<Date | null> {
    this.hit("latestSyncedAt");
    let latest: Date | null = null;
    for (const r of this.records.values()) {
      if (r.dataType === dataType && (!latest || r.syncedAt > latest)) latest = r.syncedAt;
    }
    return latest;
  }

  /** Seed a record directly (bypasses counters and failure injection). */
  seed(key: CacheKey, payload: AnyCellValue, syncedAt: Date): void {
    this.put(key, payload, syncedAt);
  }

  of(dataType: DataType): CacheRecord[] {
    return [...this.records.values()]
      .filter((r) => r.dataType === dataType)
      .sort((a, b) => cacheKeyId(a).localeCompare(cacheKeyId(b)));
  }

  private hit(op: StoreOp): void {
    this.calls[op]++;
    if (this.failing.has(op)) throw new StoreError(op, `injected ${op} failure`);
  }

  private put(key: CacheKey, payload: AnyCellValue, syncedAt: Date): void {
    this.records.set(cacheKeyId(key), { ...key, payload, syncedAt });
  }
}
