// backend/services/schooldata/src/repo/cache.store.types.ts
/**
 * Canonical store interface for cached school data.
 * - One record per full key; upserts replace payload + syncedAt atomically
 *   per document. No multi-document transactions.
 * - Implementations surface storage failures as StoreError.
 */

import type {
  AnyCellValue,
  CacheKey,
  CacheRecord,
  Section,
} from "../contracts/cache.contract";
import type { DataType } from "../contracts/dataType";
import type { DateRange } from "../utils/dates";

export type CacheWrite = { key: CacheKey; payload: AnyCellValue };

export interface ICacheStore {
  /** Ensure required indexes (idempotent; safe to call at startup). */
  ensureIndexes(): Promise<void>;

  upsert(key: CacheKey, payload: AnyCellValue, syncedAt: Date): Promise<void>;

  /** Independent single-document upserts; returns how many were written. */
  upsertMany(entries: CacheWrite[], syncedAt: Date): Promise<number>;

  /** Ascending by date, then grade, then classNo. Missing keys are simply absent. */
  readRange(dataType: DataType, range: DateRange, section?: Section): Promise<CacheRecord[]>;

  freshnessOf(key: CacheKey): Promise<Date | null>;

  latestSyncedAt(dataType: DataType): Promise<Date | null>;
}
