// backend/services/schooldata/src/health/checks.ts
import type { HealthProbe, IHealthCheck } from "@shared/health/types";
import type { SchoolDataService } from "../services/SchoolDataService";

const READY_STATES: Record<number, string> = {
  0: "disconnected",
  1: "connected",
  2: "connecting",
  3: "disconnecting",
};

/** Critical: without the store nothing can be served. */
export class MongoHealthCheck implements IHealthCheck {
  readonly name = "mongo";
  readonly critical = true;

  constructor(private readonly connection: { readonly readyState: number }) {}

  async check(): Promise<HealthProbe> {
    const state = this.connection.readyState;
    const label = READY_STATES[state] ?? `state=${state}`;
    return state === 1 ? { ok: true, details: { state: label } } : { ok: false, error: label };
  }
}

/** Non-critical: stale data still serves, but the service reports degraded. */
export class CacheFreshnessCheck implements IHealthCheck {
  readonly name = "cache-freshness";
  readonly critical = false;

  constructor(private readonly service: Pick<SchoolDataService, "healthcheck">) {}

  async check(): Promise<HealthProbe> {
    const report = await this.service.healthcheck();
    const stale = Object.entries(report)
      .filter(([, v]) => v.isStale)
      .map(([k]) => k);
    return stale.length
      ? { ok: false, details: report, error: `stale: ${stale.join(", ")}` }
      : { ok: true, details: report };
  }
}
