// backend/services/shared/src/health/types.ts
/**
 * Contracts for health checks and aggregate results.
 */

export type HealthStatus = "ok" | "degraded" | "down";

export interface HealthCheckResult {
  name: string;
  ok: boolean;
  critical: boolean;
  durationMs: number;
  details?: Record<string, unknown>;
  error?: string;
}

/** Result a check returns; name/critical/timing are filled in by HealthService. */
export type HealthProbe = {
  ok: boolean;
  details?: Record<string, unknown>;
  error?: string;
};

export interface IHealthCheck {
  readonly name: string;
  /** A failing critical check makes the service "down"; others only "degraded". */
  readonly critical: boolean;
  check(): Promise<HealthProbe>;
}

export interface HealthReport {
  status: HealthStatus;
  service: string;
  uptimeSec: number;
  checks: HealthCheckResult[];
}
