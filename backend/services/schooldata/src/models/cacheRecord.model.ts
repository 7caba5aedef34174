// backend/services/schooldata/src/models/cacheRecord.model.ts
/**
 * One document per cache cell. _id is the deterministic cell id
 * ("meal:2024-03-01", "timetable:2024-03-01:1:3"), so an upsert can never
 * create a second document for the same key.
 */

import { Schema, model, models, type Model } from "mongoose";
import { DATA_TYPES, type DataType } from "../contracts/dataType";

export interface CacheRecordDoc {
  _id: string;
  dataType: DataType;
  date: string;
  grade: number | null;
  classNo: number | null;
  payload: unknown;
  syncedAt: Date;
}

const CacheRecordSchema = new Schema<CacheRecordDoc>(
  {
    _id: { type: String, required: true },
    dataType: { type: String, required: true, enum: DATA_TYPES },
    date: { type: String, required: true, match: /^\d{4}-\d{2}-\d{2}$/ },
    grade: { type: Number, default: null },
    classNo: { type: Number, default: null },
    payload: { type: Schema.Types.Mixed, required: true },
    syncedAt: { type: Date, required: true },
  },
  {
    collection: "cache_records",
    bufferCommands: false,
    versionKey: false,
    strict: true,
    minimize: false,
  }
);

CacheRecordSchema.index(
  { dataType: 1, date: 1, grade: 1, classNo: 1 },
  { unique: true, name: "uq_cell" }
);
CacheRecordSchema.index({ dataType: 1, syncedAt: -1 }, { name: "ix_type_syncedAt" });

export const CacheRecordModel: Model<CacheRecordDoc> =
  models.CacheRecord || model<CacheRecordDoc>("CacheRecord", CacheRecordSchema);
