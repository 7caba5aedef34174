// backend/services/schooldata/src/repo/cache.mongo.store.ts
/**
 * Purpose:
 * - Mongo (mongoose) adapter for the cache store.
 *
 * Notes:
 * - Writes are updateOne upserts keyed by the deterministic _id; a batch is an
 *   unordered bulkWrite of those, so each document is replaced atomically and
 *   one bad document does not block the rest.
 * - Reads validate stored payloads; documents that no longer match the
 *   canonical schema are skipped and will be rewritten by the next sync.
 */

import type { Model } from "mongoose";
import { ServiceBase } from "@shared/base/ServiceBase";
import {
  cacheKeyId,
  parseCellValue,
  type AnyCellValue,
  type CacheKey,
  type CacheRecord,
  type Section,
} from "../contracts/cache.contract";
import { zDataType, type DataType } from "../contracts/dataType";
import { StoreError } from "../errors";
import { CacheRecordModel, type CacheRecordDoc } from "../models/cacheRecord.model";
import type { DateRange } from "../utils/dates";
import type { CacheWrite, ICacheStore } from "./cache.store.types";

export class CacheMongoStore extends ServiceBase implements ICacheStore {
  constructor(private readonly model: Model<CacheRecordDoc> = CacheRecordModel) {
    super({ service: "schooldata", context: { collection: model.collection.collectionName } });
  }

  async ensureIndexes(): Promise<void> {
    await this.guard("ensureIndexes", () => this.model.createIndexes());
  }

  async upsert(key: CacheKey, payload: AnyCellValue, syncedAt: Date): Promise<void> {
    await this.guard("upsert", () =>
      this.model
        .updateOne({ _id: cacheKeyId(key) }, { $set: { ...key, payload, syncedAt } }, { upsert: true })
        .exec()
    );
  }

  async upsertMany(entries: CacheWrite[], syncedAt: Date): Promise<number> {
    if (entries.length === 0) return 0;
    const res = await this.guard("upsertMany", () =>
      this.model.bulkWrite(
        entries.map((e) => ({
          updateOne: {
            filter: { _id: cacheKeyId(e.key) },
            update: { $set: { ...e.key, payload: e.payload, syncedAt } },
            upsert: true,
          },
        })),
        { ordered: false }
      )
    );
    return res.upsertedCount + res.matchedCount;
  }

  async readRange(dataType: DataType, range: DateRange, section?: Section): Promise<CacheRecord[]> {
    const filter = {
      dataType,
      date: { $gte: range.start, $lte: range.end },
      ...(section ? { grade: section.grade, classNo: section.classNo } : {}),
    };
    const docs = await this.guard("readRange", () =>
      this.model.find(filter).sort({ date: 1, grade: 1, classNo: 1 }).lean<CacheRecordDoc[]>().exec()
    );

    const out: CacheRecord[] = [];
    for (const doc of docs) {
      const rec = toCacheRecord(doc);
      if (rec) out.push(rec);
      else this.log.warn({ id: doc._id }, "stored record does not match schema; treating as missing");
    }
    return out;
  }

  async freshnessOf(key: CacheKey): Promise<Date | null> {
    const doc = await this.guard("freshnessOf", () =>
      this.model.findById(cacheKeyId(key)).select({ syncedAt: 1 }).lean<Pick<CacheRecordDoc, "syncedAt">>().exec()
    );
    return doc ? doc.syncedAt : null;
  }

  async latestSyncedAt(dataType: DataType): Promise<Date | null> {
    const doc = await this.guard("latestSyncedAt", () =>
      this.model
        .findOne({ dataType })
        .sort({ syncedAt: -1 })
        .select({ syncedAt: 1 })
        .lean<Pick<CacheRecordDoc, "syncedAt">>()
        .exec()
    );
    return doc ? doc.syncedAt : null;
  }

  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.log.error({ op, err: this.log.serializeError(err) }, "cache store operation failed");
      throw new StoreError(op, `cache store ${op} failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }
}

/** Stored document → domain record; null when it no longer validates. */
export function toCacheRecord(doc: CacheRecordDoc): CacheRecord | null {
  const dataType = zDataType.safeParse(doc.dataType);
  if (!dataType.success) return null;
  const payload = parseCellValue(dataType.data, doc.payload);
  if (!payload) return null;
  return {
    dataType: dataType.data,
    date: doc.date,
    grade: doc.grade ?? null,
    classNo: doc.classNo ?? null,
    payload,
    syncedAt: doc.syncedAt,
  };
}
