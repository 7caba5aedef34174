// backend/services/schooldata/src/routes/days.routes.ts
import { Router } from "express";
import { listDays, type ListDaysDeps } from "../controllers/days/handlers/list";

export function daysRoutes(deps: ListDaysDeps): Router {
  const router = Router();
  // one-liners only; no logic here
  router.get("/", listDays(deps));
  return router;
}
