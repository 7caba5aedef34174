// backend/services/schooldata/src/app.ts
/**
 * Assembled via the shared builder:
 *   requestId → httpLogger → health (open) → json → /api routes → 404 → error.
 * Dependencies are passed in so tests can build the app around fakes.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import { HealthService } from "@shared/health/HealthService";
import { CacheFreshnessCheck, MongoHealthCheck } from "./health/checks";
import { cacheRoutes } from "./routes/cache.routes";
import { daysRoutes } from "./routes/days.routes";
import type { SchoolDataService } from "./services/SchoolDataService";

export type CreateAppDeps = {
  serviceName: string;
  service: Pick<SchoolDataService, "getDays" | "healthcheck">;
  timeZone: string;
  /** Anything exposing a mongoose-style readyState. */
  connection: { readonly readyState: number };
  now?: () => Date;
};

export function createApp(deps: CreateAppDeps): Express {
  const health = new HealthService(deps.serviceName)
    .add(new MongoHealthCheck(deps.connection))
    .add(new CacheFreshnessCheck(deps.service));

  return createServiceApp({
    serviceName: deps.serviceName,
    apiPrefix: "/api",
    health,
    mountRoutes: (api) => {
      api.use("/days", daysRoutes({ service: deps.service, timeZone: deps.timeZone, now: deps.now }));
      api.use("/cache", cacheRoutes(deps.service));
    },
  });
}
