// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the standard internal service stack:
 *   requestId → http logger → health → json parser → routes → 404 → error handler.
 *
 * Notes:
 * - Health endpoints stay open and are mounted before body parsing.
 * - Routes are one-liners that delegate to handlers.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundProblemJson, errorProblemJson } from "../middleware/problemJson";
import { createHealthRouter } from "../health/createHealthRouter";
import type { HealthService } from "../health/HealthService";

export type CreateServiceAppOptions = {
  /** Service slug; used in logs. */
  serviceName: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  mountRoutes: (router: express.Router) => void;
  /** Readiness checks behind /readyz. */
  health?: HealthService;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, health } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  app.use(createHealthRouter({ service: serviceName, health }));

  app.use(express.json({ limit: "1mb" }));

  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  app.use(notFoundProblemJson([apiPrefix, "/health", "/healthz", "/readyz"]));
  app.use(errorProblemJson(serviceName));

  return app;
}
