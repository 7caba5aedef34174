// backend/services/schooldata/src/bootstrap.ts
/**
 * Side-effect module, imported first by index.ts:
 * - load envs via the shared cascade (repo → family → service, later wins)
 * - fail fast on the variables the service cannot start without
 */

import path from "node:path";
import { assertEnv, loadEnvCascadeForService } from "@shared/env";

export const SERVICE_NAME = "schooldata" as const;
export const SERVICE_ROOT = path.resolve(__dirname, "..");

loadEnvCascadeForService(__dirname);

assertEnv([
  "LOG_LEVEL",
  "SCHOOLDATA_PORT",
  "SCHOOLDATA_MONGO_URI",
  "NEIS_API_KEY",
  "NEIS_ATPT_CODE",
  "NEIS_SCHOOL_CODE",
  "NEIS_NUM_GRADES",
  "NEIS_NUM_CLASSES",
  "KMA_API_KEY",
  "KMA_NX",
  "KMA_NY",
  "SEOUL_DATA_TOKEN",
]);
