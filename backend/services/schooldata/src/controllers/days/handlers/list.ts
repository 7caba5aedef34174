// backend/services/schooldata/src/controllers/days/handlers/list.ts
import type { RequestHandler } from "express";
import { badRequest } from "@shared/problem/problem";
import { getRequestId } from "@shared/middleware/requestId";
import { getLogger } from "@shared/logger/Logger";
import type { Section } from "../../../contracts/cache.contract";
import type { SchoolDataService } from "../../../services/SchoolDataService";
import { addDays, todayIn, type DateRange } from "../../../utils/dates";
import { zDaysQuery, type DaysQuery } from "./schemas";

const log = getLogger({ service: "schooldata", component: "DaysHandlers.list" });

export const DEFAULT_DAYS_BEFORE = 1;
export const DEFAULT_DAYS_AFTER = 7;

export type ListDaysDeps = {
  service: Pick<SchoolDataService, "getDays">;
  timeZone: string;
  now?: () => Date;
};

export function rangeFromQuery(q: DaysQuery, today: string): DateRange {
  if (q.date) return { start: q.date, end: q.date };
  return {
    start: q.from ?? addDays(today, -DEFAULT_DAYS_BEFORE),
    end: q.to ?? addDays(q.from ?? today, DEFAULT_DAYS_AFTER),
  };
}

// GET /days?from=&to=  |  ?date=  [&grade=&class=]
export function listDays(deps: ListDaysDeps): RequestHandler {
  const now = deps.now ?? (() => new Date());
  return (req, res, next) => {
    const requestId = getRequestId(res);
    const parsed = zDaysQuery.safeParse(req.query);
    if (!parsed.success) {
      next(badRequest("invalid query", parsed.error.flatten()));
      return;
    }

    const q = parsed.data;
    const range = rangeFromQuery(q, todayIn(deps.timeZone, now()));
    const section: Section | undefined =
      q.grade !== undefined && q.class !== undefined ? { grade: q.grade, classNo: q.class } : undefined;

    // Client disconnect detaches this request from the sync it joined.
    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) disconnect.abort();
    });

    log.debug({ requestId, ...range, section }, "enter");
    deps.service
      .getDays(range, section, { signal: disconnect.signal })
      .then(({ sync, days }) => {
        log.debug({ requestId, days: days.length, sync: sync.status }, "exit");
        res.json({ requestId, range, sync, data: days });
      })
      .catch(next);
  };
}
