// backend/services/schooldata/src/routes/cache.routes.ts
import { Router } from "express";
import { cacheHealth } from "../controllers/cache/handlers/health";
import type { SchoolDataService } from "../services/SchoolDataService";

export function cacheRoutes(service: Pick<SchoolDataService, "healthcheck">): Router {
  const router = Router();
  router.get("/health", cacheHealth(service));
  return router;
}
