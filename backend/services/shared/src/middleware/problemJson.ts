// backend/services/shared/src/middleware/problemJson.ts
/**
 * Purpose:
 * - RFC 7807 Problem+JSON for every error response, so clients and tests can
 *   rely on one shape across services.
 *
 * Notes:
 * - 404s are formatted only under known prefixes; everything else gets a
 *   bare 404.
 * - 5xx are logged at error, 4xx at warn. Detail of unknown errors is never
 *   sent to the client.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { getLogger } from "../logger/Logger";
import { toProblem } from "../problem/problem";
import { getRequestId } from "./requestId";

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      res
        .status(404)
        .type("application/problem+json")
        .json({
          type: "about:blank",
          title: "Not Found",
          status: 404,
          detail: "Route not found",
          instance: getRequestId(res),
        });
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(serviceName: string): ErrorRequestHandler {
  const log = getLogger({ service: serviceName, component: "errorProblemJson" });

  return (err: unknown, req, res, _next) => {
    const problem = toProblem(err, getRequestId(res));
    const ctx = {
      status: problem.status,
      code: problem.code,
      method: req.method,
      path: req.originalUrl,
      requestId: problem.instance,
      err: log.serializeError(err),
    };
    if (problem.status >= 500) log.error(ctx, "request error");
    else log.warn(ctx, "request rejected");

    res.status(problem.status).type("application/problem+json").json(problem);
  };
}
