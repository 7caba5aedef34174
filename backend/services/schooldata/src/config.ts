// backend/services/schooldata/src/config.ts
/**
 * Config for the schooldata service.
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Credentials, endpoints of identity (school, forecast grid) and ports are
 *   required; tuning knobs have documented defaults.
 * - Fail fast: loadConfig throws on the first missing or invalid value.
 */

import path from "node:path";
import type { LevelWithSilent } from "pino";
import { isLogLevel } from "@shared/logger/Logger";
import type { DataType } from "./contracts/dataType";

type Env = NodeJS.ProcessEnv;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type SchoolDataConfig = {
  serviceName: string;
  env: string;
  port: number;
  mongoUri: string;
  logLevel: LevelWithSilent;
  timeZone: string;
  neis: { baseUrl: string; apiKey: string; officeCode: string; schoolCode: string };
  kma: { baseUrl: string; apiKey: string; nx: number; ny: number };
  seoul: { baseUrl: string; token: string };
  sections: { grades: number; classes: number };
  ttlMs: Record<DataType, number>;
  sync: {
    intervalMs: number;
    warmWindowDays: number;
    maxRangeDays: number;
    readTimeoutMs: number;
  };
  upstream: { timeoutMs: number; retry: RetryPolicy };
  highlightKeywordsFile: string;
};

function requireEnv(env: Env, name: string): string {
  const v = env[name];
  if (v == null || String(v).trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

function optionalEnv(env: Env, name: string, fallback: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? fallback : v.trim();
}

function parseNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

function requireInt(env: Env, name: string, min = 1): number {
  const n = parseNumber(name, requireEnv(env, name));
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`Env var ${name} must be an integer >= ${min}, got ${n}`);
  }
  return n;
}

function requireNumber(env: Env, name: string): number {
  return parseNumber(name, requireEnv(env, name));
}

function intOr(env: Env, name: string, fallback: number, min = 1): number {
  const v = env[name];
  if (v == null || v.trim() === "") return fallback;
  const n = parseNumber(name, v.trim());
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`Env var ${name} must be an integer >= ${min}, got ${n}`);
  }
  return n;
}

export const DEFAULT_HIGHLIGHT_KEYWORDS_FILE = "data/highlight-keywords.txt";

/**
 * @param serviceRoot directory the keywords file path is resolved against
 */
export function loadConfig(env: Env = process.env, serviceRoot = process.cwd()): SchoolDataConfig {
  const logLevel = requireEnv(env, "LOG_LEVEL");
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: "${logLevel}"`);
  }

  return {
    serviceName: "schooldata",
    env: optionalEnv(env, "NODE_ENV", "dev"),
    port: requireInt(env, "SCHOOLDATA_PORT", 0),
    mongoUri: requireEnv(env, "SCHOOLDATA_MONGO_URI"),
    logLevel,
    timeZone: optionalEnv(env, "SCHOOLDATA_TIMEZONE", "Asia/Seoul"),

    neis: {
      baseUrl: optionalEnv(env, "NEIS_BASE_URL", "https://open.neis.go.kr/hub"),
      apiKey: requireEnv(env, "NEIS_API_KEY"),
      officeCode: requireEnv(env, "NEIS_ATPT_CODE"),
      schoolCode: requireEnv(env, "NEIS_SCHOOL_CODE"),
    },
    kma: {
      baseUrl: optionalEnv(
        env,
        "KMA_BASE_URL",
        "https://apis.data.go.kr/1360000/VilageFcstInfoService_2.0"
      ),
      apiKey: requireEnv(env, "KMA_API_KEY"),
      nx: requireNumber(env, "KMA_NX"),
      ny: requireNumber(env, "KMA_NY"),
    },
    seoul: {
      baseUrl: optionalEnv(env, "SEOUL_BASE_URL", "http://openapi.seoul.go.kr:8088"),
      token: requireEnv(env, "SEOUL_DATA_TOKEN"),
    },
    sections: {
      grades: requireInt(env, "NEIS_NUM_GRADES"),
      classes: requireInt(env, "NEIS_NUM_CLASSES"),
    },
    ttlMs: {
      meal: intOr(env, "TTL_MEAL_MS", 3 * HOUR_MS),
      schedule: intOr(env, "TTL_SCHEDULE_MS", 3 * HOUR_MS),
      timetable: intOr(env, "TTL_TIMETABLE_MS", 3 * HOUR_MS),
      weather: intOr(env, "TTL_WEATHER_MS", HOUR_MS),
      waterTemperature: intOr(env, "TTL_WATER_TEMPERATURE_MS", 76 * MINUTE_MS),
    },
    sync: {
      intervalMs: intOr(env, "SYNC_INTERVAL_MS", 3 * HOUR_MS),
      warmWindowDays: intOr(env, "SYNC_WARM_WINDOW_DAYS", 10, 0),
      maxRangeDays: intOr(env, "SYNC_MAX_RANGE_DAYS", 31),
      readTimeoutMs: intOr(env, "SYNC_READ_TIMEOUT_MS", 8_000),
    },
    upstream: {
      timeoutMs: intOr(env, "UPSTREAM_TIMEOUT_MS", 10_000),
      retry: {
        attempts: intOr(env, "UPSTREAM_RETRY_ATTEMPTS", 3),
        baseDelayMs: intOr(env, "UPSTREAM_RETRY_BASE_MS", 500, 0),
        maxDelayMs: intOr(env, "UPSTREAM_RETRY_MAX_MS", 8_000, 0),
      },
    },
    highlightKeywordsFile: path.resolve(
      serviceRoot,
      optionalEnv(env, "MEAL_HIGHLIGHT_KEYWORDS_FILE", DEFAULT_HIGHLIGHT_KEYWORDS_FILE)
    ),
  };
}
