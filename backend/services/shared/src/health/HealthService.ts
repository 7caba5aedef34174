// backend/services/shared/src/health/HealthService.ts
/**
 * Purpose:
 * - Run the registered checks concurrently and fold them into one status.
 */

import type {
  IHealthCheck,
  HealthCheckResult,
  HealthReport,
  HealthStatus,
} from "./types";

export class HealthService {
  private readonly startedAt: number;
  private readonly checks: IHealthCheck[] = [];

  constructor(
    private readonly serviceName: string,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  public add(check: IHealthCheck): this {
    this.checks.push(check);
    return this;
  }

  public async run(): Promise<HealthReport> {
    const results = await Promise.all(this.checks.map((c) => this.runOne(c)));
    return {
      status: computeStatus(results),
      service: this.serviceName,
      uptimeSec: Math.floor((this.now() - this.startedAt) / 1000),
      checks: results,
    };
  }

  private async runOne(c: IHealthCheck): Promise<HealthCheckResult> {
    const t0 = this.now();
    try {
      const r = await c.check();
      return {
        name: c.name,
        critical: c.critical,
        durationMs: this.now() - t0,
        ok: r.ok,
        details: r.details,
        error: r.error,
      };
    } catch (err) {
      return {
        name: c.name,
        critical: c.critical,
        durationMs: this.now() - t0,
        ok: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

export function computeStatus(results: HealthCheckResult[]): HealthStatus {
  if (results.some((r) => r.critical && !r.ok)) return "down";
  return results.some((r) => !r.ok) ? "degraded" : "ok";
}
