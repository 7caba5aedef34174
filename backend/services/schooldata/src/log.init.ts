// backend/services/schooldata/src/log.init.ts
/**
 * Side-effect module: tags the shared pino root with this service's name and
 * level. Import once, right after bootstrap, before anything logs.
 */

import { initLogger, isLogLevel } from "@shared/logger/Logger";
import { SERVICE_NAME } from "./bootstrap";

const level = (process.env.LOG_LEVEL ?? "").trim();
initLogger({ service: SERVICE_NAME, level: isLogLevel(level) ? level : "info" });
