// backend/services/schooldata/src/db.ts
import mongoose from "mongoose";
import { getLogger } from "@shared/logger/Logger";

const log = getLogger({ service: "schooldata", component: "mongodb" });

export function redactMongoUri(uri: string): string {
  return uri.replace(/:\/\/[^@/]*@/, "://***:***@");
}

/** Connect once; rejects (no process.exit) so the entrypoint decides. */
export async function connectDb(uri: string): Promise<typeof mongoose> {
  mongoose.set("strictQuery", true);
  try {
    const conn = await mongoose.connect(uri, { bufferCommands: false, serverSelectionTimeoutMS: 10_000 });
    log.info({ uri: redactMongoUri(uri) }, "connected");
    return conn;
  } catch (err) {
    log.error({ uri: redactMongoUri(uri), err: log.serializeError(err) }, "connection error");
    throw err;
  }
}

export async function disconnectDb(): Promise<void> {
  await mongoose.disconnect();
  log.info("disconnected");
}
