// backend/services/shared/src/health/createHealthRouter.ts
/**
 * Exposes:
 *   GET /health    -> liveness
 *   GET /healthz   -> k8s-style liveness
 *   GET /readyz    -> readiness (HealthService report; 503 when "down")
 */

import express from "express";
import type { HealthService } from "./HealthService";
import { getRequestId } from "../middleware/requestId";

export function createHealthRouter(opts: {
  service: string;
  health?: HealthService;
}): express.Router {
  const router = express.Router();

  const liveness: express.RequestHandler = (_req, res) => {
    res.json({ service: opts.service, ok: true, instance: getRequestId(res) });
  };

  const readiness: express.RequestHandler = (_req, res, next) => {
    if (!opts.health) {
      res.json({ service: opts.service, ok: true, status: "ok", instance: getRequestId(res) });
      return;
    }
    opts.health
      .run()
      .then((report) => {
        const ok = report.status !== "down";
        res.status(ok ? 200 : 503).json({ ...report, ok, instance: getRequestId(res) });
      })
      .catch(next);
  };

  router.get("/health", liveness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
