// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for all services with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 *
 * Notes:
 * - One pino root per process. initLogger() replaces it once the service knows
 *   its name and level; bound handles always write through the current root,
 *   so handles created at import time pick up the change.
 */

import pino, { type Logger as PinoLogger, type LevelWithSilent } from "pino";

type Json = Record<string, unknown>;

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

/** Public interface for bound logger handles. */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  debug(msg: string, meta?: Json): void;
  debug(obj: Json, msg?: string): void;

  info(msg: string, meta?: Json): void;
  info(obj: Json, msg?: string): void;

  warn(msg: string, meta?: Json): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string, meta?: Json): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): { name?: string; message: string; stack?: string };
}

const REDACT_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers['x-api-key']",
  "res.headers['set-cookie']",
  "err.config.params.KEY",
  "err.config.params.serviceKey",
];

function buildRoot(level: LevelWithSilent, service?: string): PinoLogger {
  return pino({
    level,
    base: service ? { service } : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, remove: true },
  });
}

function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").trim();
  return isLogLevel(raw) ? raw : "info";
}

let ROOT: PinoLogger = buildRoot(levelFromEnv());

/** Call once per process, after env is loaded. */
export function initLogger(opts: { service: string; level: LevelWithSilent }): void {
  ROOT = buildRoot(opts.level, opts.service);
}

export function setLogLevel(level: LevelWithSilent): void {
  ROOT.level = level;
}

/** The raw pino root, for integrations (pino-http) that need a pino instance. */
export function getRootLogger(): PinoLogger {
  return ROOT;
}

type Level = "debug" | "info" | "warn" | "error";

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json) {}

  bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  debug(a: string | Json, b?: string | Json): void {
    this.write("debug", a, b);
  }

  info(a: string | Json, b?: string | Json): void {
    this.write("info", a, b);
  }

  warn(a: string | Json, b?: string | Json): void {
    this.write("warn", a, b);
  }

  error(a: string | Json, b?: string | Json): void {
    this.write("error", a, b);
  }

  serializeError(err: unknown): { name?: string; message: string; stack?: string } {
    if (err instanceof Error) {
      return { name: err.name, message: err.message, stack: err.stack };
    }
    return { message: String(err) };
  }

  private write(level: Level, a: string | Json, b?: string | Json): void {
    let obj: Json = {};
    let msg: string | undefined;
    if (typeof a === "string") {
      msg = a;
      if (b && typeof b === "object") obj = b;
    } else {
      obj = a;
      if (typeof b === "string") msg = b;
    }
    ROOT[level]({ ...this.ctx, ...obj }, msg);
  }
}

export function getLogger(ctx: Json = {}): IBoundLogger {
  return new BoundLogger(ctx);
}
