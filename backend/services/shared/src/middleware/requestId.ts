// backend/services/shared/src/middleware/requestId.ts
/**
 * Purpose:
 * - Every inbound request carries a stable correlation key so logs and
 *   Problem+JSON bodies can be tied together.
 *
 * Notes:
 * - Must run before the http logger; pino-http reuses the header set here.
 * - Never overwrites a caller-supplied id. Honors x-request-id and
 *   x-correlation-id; the response always echoes x-request-id.
 */

import type { RequestHandler, Response } from "express";
import { randomUUID } from "node:crypto";

function firstHeader(v: string | string[] | undefined): string | undefined {
  const s = Array.isArray(v) ? v[0] : v;
  return s && s.trim() ? s.trim() : undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id =
      firstHeader(req.headers["x-request-id"]) ??
      firstHeader(req.headers["x-correlation-id"]) ??
      randomUUID();

    req.headers["x-request-id"] = id;
    res.locals.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  };
}

export function getRequestId(res: Response): string | undefined {
  const v: unknown = res.locals.requestId;
  return typeof v === "string" ? v : undefined;
}
