// backend/services/schooldata/index.ts
/**
 * Start-up: load env (bootstrap), init logs, connect DB, ensure indexes,
 * serve HTTP, then start the warm-window scheduler (it does not gate serving).
 * Shutdown: close HTTP, stop the scheduler, let in-flight sync operations
 * persist, disconnect Mongo.
 */

import "./src/bootstrap";
import "./src/log.init";

import mongoose from "mongoose";
import { getLogger } from "@shared/logger/Logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { createApp } from "./src/app";
import { SERVICE_NAME, SERVICE_ROOT } from "./src/bootstrap";
import { loadConfig } from "./src/config";
import { buildContainer } from "./src/container";
import { connectDb, disconnectDb } from "./src/db";
import { loadHighlightKeywords } from "./src/highlightKeywords";
import { CacheMongoStore } from "./src/repo/cache.mongo.store";

const log = getLogger({ service: SERVICE_NAME, component: "index" });

process.on("unhandledRejection", (reason) => {
  log.error({ reason: log.serializeError(reason) }, "unhandled promise rejection");
});
process.on("uncaughtException", (err) => {
  log.error({ err: log.serializeError(err) }, "uncaught exception");
});

async function start(): Promise<void> {
  const config = loadConfig(process.env, SERVICE_ROOT);

  await connectDb(config.mongoUri);
  const store = new CacheMongoStore();
  await store.ensureIndexes();

  const highlightKeywords = await loadHighlightKeywords(config.highlightKeywordsFile);
  log.info({ file: config.highlightKeywordsFile, count: highlightKeywords.length }, "highlight keywords loaded");

  const { engine, service, scheduler } = buildContainer({ config, store, highlightKeywords });

  const app = createApp({
    serviceName: SERVICE_NAME,
    service,
    timeZone: config.timeZone,
    connection: mongoose.connection,
  });

  startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger: log,
    onShutdown: async () => {
      await scheduler.stop();
      await engine.drain();
      await disconnectDb();
    },
  });

  scheduler.start();
}

start().catch((err: unknown) => {
  log.error({ err: log.serializeError(err) }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
