// backend/services/schooldata/test/helpers/testConfig.ts
import { loadConfig, type SchoolDataConfig } from "../../src/config";

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: "test",
  LOG_LEVEL: "silent",
  SCHOOLDATA_PORT: "0",
  SCHOOLDATA_MONGO_URI: "mongodb://127.0.0.1:27017/schooldata-test",
  NEIS_API_KEY: "test-secret",
  NEIS_ATPT_CODE: "B10",
  NEIS_SCHOOL_CODE: "7010000",
  NEIS_NUM_GRADES: "2",
  NEIS_NUM_CLASSES: "2",
  KMA_API_KEY: "test-secret",
  KMA_NX: "60",
  KMA_NY: "127",
  SEOUL_DATA_TOKEN: "test-token",
};

export function testConfig(overrides: NodeJS.ProcessEnv = {}): SchoolDataConfig {
  return loadConfig({ ...TEST_ENV, ...overrides }, "/srv/schooldata");
}

export const ZERO_RETRY = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };
