// backend/services/schooldata/src/container.ts
/**
 * Wires connectors, engine, read path and scheduler from config.
 * No I/O at construction; index.ts owns connect/listen/shutdown.
 */

import type { AxiosInstance } from "axios";
import type { SchoolDataConfig } from "./config";
import { ConnectorRegistry } from "./connectors/connectorRegistry";
import type { IConnector } from "./connectors/connector.types";
import { KmaWeatherConnector } from "./connectors/kmaWeather.connector";
import { NeisConnector } from "./connectors/neis.connector";
import { SeoulWaterConnector } from "./connectors/seoulWater.connector";
import { UpstreamHttp } from "./connectors/upstreamHttp";
import type { ICacheStore } from "./repo/cache.store.types";
import { WarmWindowScheduler } from "./scheduler/WarmWindowScheduler";
import { SchoolDataService } from "./services/SchoolDataService";
import { SyncEngine } from "./sync/SyncEngine";
import type { Sleep } from "./sync/withRetry";

export type ContainerDeps = {
  config: SchoolDataConfig;
  store: ICacheStore;
  highlightKeywords: readonly string[];
  /** Shared by all connectors; tests pass one with an in-process adapter. */
  http?: AxiosInstance;
  now?: () => Date;
  sleep?: Sleep;
};

export type Container = {
  connectors: ConnectorRegistry;
  engine: SyncEngine;
  service: SchoolDataService;
  scheduler: WarmWindowScheduler;
};

export function buildConnectors(config: SchoolDataConfig, http?: AxiosInstance, now?: () => Date): IConnector[] {
  const upstream = (provider: string) =>
    new UpstreamHttp({ provider, timeoutMs: config.upstream.timeoutMs, http });
  return [
    new NeisConnector({ http: upstream("neis"), ...config.neis }),
    new KmaWeatherConnector({ http: upstream("kma"), ...config.kma, timeZone: config.timeZone, now }),
    new SeoulWaterConnector({ http: upstream("seoul"), ...config.seoul }),
  ];
}

export function buildContainer(deps: ContainerDeps): Container {
  const { config, store } = deps;

  const connectors = new ConnectorRegistry(buildConnectors(config, deps.http, deps.now));
  const uncovered = connectors.uncovered();
  if (uncovered.length) {
    throw new Error(`no connector for data types: ${uncovered.join(", ")}`);
  }

  const engine = new SyncEngine({
    store,
    connectors,
    ttlMs: config.ttlMs,
    sections: config.sections,
    retry: config.upstream.retry,
    normalize: { highlightKeywords: deps.highlightKeywords },
    now: deps.now,
    sleep: deps.sleep,
  });

  const service = new SchoolDataService({
    engine,
    store,
    ttlMs: config.ttlMs,
    sections: config.sections,
    maxRangeDays: config.sync.maxRangeDays,
    readTimeoutMs: config.sync.readTimeoutMs,
    now: deps.now,
  });

  const scheduler = new WarmWindowScheduler({
    engine,
    timeZone: config.timeZone,
    windowDays: config.sync.warmWindowDays,
    intervalMs: config.sync.intervalMs,
    now: deps.now,
  });

  return { connectors, engine, service, scheduler };
}
