// backend/services/schooldata/src/scheduler/PeriodicTask.ts
/**
 * Purpose:
 * - Cadence wrapper: run a pass now, then again every intervalMs, until stop().
 *
 * Invariants:
 * - Passes never overlap; the next sleep starts after the previous pass settles.
 * - A failed pass is logged and the loop keeps going.
 * - stop() aborts the sleep and the running pass's signal, then waits for the
 *   loop to exit. Both start() and stop() are idempotent.
 *
 * Usage:
 *   const task = new PeriodicTask({ name: "warm-window", intervalMs, run });
 *   task.start();
 *   // on shutdown:
 *   await task.stop();
 */

import { setTimeout as delay } from "node:timers/promises";
import { ServiceBase } from "@shared/base/ServiceBase";

export type PeriodicTaskOptions = {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
  /** Must settle early once `signal` aborts. Defaults to an abortable timer. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

export class PeriodicTask extends ServiceBase {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private passes = 0;

  constructor(private readonly opts: PeriodicTaskOptions) {
    super({ service: "schooldata", context: { task: opts.name } });
    if (!Number.isFinite(opts.intervalMs) || opts.intervalMs <= 0) {
      throw new Error(`[${opts.name}] intervalMs must be a positive number, got "${opts.intervalMs}"`);
    }
  }

  /** Starts the loop; the first pass runs immediately. NOP if already running. */
  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal);
    this.log.info({ intervalMs: this.opts.intervalMs }, "periodic task started");
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) return;
    controller.abort();
    await loop;
    this.controller = null;
    this.loop = null;
    this.log.info({ passes: this.passes }, "periodic task stopped");
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /** Completed passes (successful or failed). */
  get passCount(): number {
    return this.passes;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const sleep = this.opts.sleep ?? abortableSleep;
    while (!signal.aborted) {
      await this.runOnce(signal);
      if (signal.aborted) break;
      try {
        await sleep(this.opts.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.log.error({ err: this.log.serializeError(err) }, "interval sleep failed; loop exiting");
        return;
      }
    }
  }

  private async runOnce(signal: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.opts.run(signal);
      this.log.debug({ durationMs: Date.now() - startedAt }, "periodic pass complete");
    } catch (err) {
      if (signal.aborted) {
        this.log.debug({ err: this.log.serializeError(err) }, "periodic pass interrupted by stop");
      } else {
        this.log.error({ err: this.log.serializeError(err) }, "periodic pass failed; next tick still runs");
      }
    } finally {
      this.passes++;
    }
  }
}
