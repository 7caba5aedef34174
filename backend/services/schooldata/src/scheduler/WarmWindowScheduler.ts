// backend/services/schooldata/src/scheduler/WarmWindowScheduler.ts
/**
 * Keeps [today − W, today + W] warm for every data type. "Today" is taken in
 * the configured time zone at the start of each pass. The first pass runs at
 * start() and does not gate serving.
 */

import { ServiceBase } from "@shared/base/ServiceBase";
import type { ISyncEngine, SyncResult } from "../sync/sync.types";
import { addDays, todayIn, type DateRange } from "../utils/dates";
import { PeriodicTask } from "./PeriodicTask";

export type WarmWindowSchedulerOptions = {
  engine: ISyncEngine;
  timeZone: string;
  windowDays: number;
  intervalMs: number;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export function warmWindow(today: string, windowDays: number): DateRange {
  return { start: addDays(today, -windowDays), end: addDays(today, windowDays) };
}

export class WarmWindowScheduler extends ServiceBase {
  private readonly task: PeriodicTask;
  private readonly now: () => Date;
  private last: SyncResult | null = null;

  constructor(private readonly opts: WarmWindowSchedulerOptions) {
    super({ service: "schooldata" });
    this.now = opts.now ?? (() => new Date());
    this.task = new PeriodicTask({
      name: "warm-window",
      intervalMs: opts.intervalMs,
      run: (signal) => this.pass(signal),
      sleep: opts.sleep,
    });
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  isRunning(): boolean {
    return this.task.isRunning();
  }

  /** Result of the most recent completed pass, if any. */
  get lastResult(): SyncResult | null {
    return this.last;
  }

  private async pass(signal: AbortSignal): Promise<void> {
    const range = warmWindow(todayIn(this.opts.timeZone, this.now()), this.opts.windowDays);
    const result = await this.opts.engine.ensureSynced(range, { signal });
    this.last = result;

    const meta = {
      start: range.start,
      end: range.end,
      covered: result.coveredDates.length,
      failures: result.failures.length,
    };
    if (result.status === "done") {
      this.log.info(meta, "warm window synced");
    } else {
      this.log.warn(meta, "warm window partially synced");
    }
  }
}
