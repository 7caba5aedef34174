// backend/services/shared/src/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { getRootLogger } from "../logger/Logger";

const QUIET_PATHS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger: getRootLogger(),
    genReqId: (req: IncomingMessage) => {
      const hdr = req.headers["x-request-id"];
      return (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
