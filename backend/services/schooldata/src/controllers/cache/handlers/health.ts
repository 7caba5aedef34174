// backend/services/schooldata/src/controllers/cache/handlers/health.ts
import type { RequestHandler } from "express";
import type { SchoolDataService } from "../../../services/SchoolDataService";

// GET /cache/health: per-type freshness plus an overall status
export function cacheHealth(service: Pick<SchoolDataService, "healthcheck">): RequestHandler {
  return (_req, res, next) => {
    service
      .healthcheck()
      .then((types) => {
        const stale = Object.values(types).some((t) => t.isStale);
        res.json({ status: stale ? "stale" : "fresh", types });
      })
      .catch(next);
  };
}
