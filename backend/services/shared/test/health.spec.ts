// backend/services/shared/test/health.spec.ts
import { describe, it, expect } from "vitest";
import { HealthService, computeStatus } from "../src/health/HealthService";
import type { HealthCheckResult, IHealthCheck } from "../src/health/types";

const result = (ok: boolean, critical: boolean): HealthCheckResult => ({
  name: "x",
  ok,
  critical,
  durationMs: 0,
});

describe("computeStatus", () => {
  it("folds check results into one status", () => {
    expect(computeStatus([])).toBe("ok");
    expect(computeStatus([result(true, true), result(false, false)])).toBe("degraded");
    expect(computeStatus([result(false, true), result(false, false)])).toBe("down");
  });
});

describe("HealthService", () => {
  it("runs checks and reports failures and throws", async () => {
    let t = 10_000;
    const svc = new HealthService("svc", () => t);
    const ok: IHealthCheck = { name: "db", critical: true, check: async () => ({ ok: true, details: { rs: 1 } }) };
    const boom: IHealthCheck = {
      name: "feed",
      critical: false,
      check: async () => {
        throw new Error("feed offline");
      },
    };
    svc.add(ok).add(boom);
    t = 12_500;

    const report = await svc.run();
    expect(report).toEqual({
      status: "degraded",
      service: "svc",
      uptimeSec: 2,
      checks: [
        { name: "db", critical: true, durationMs: 0, ok: true, details: { rs: 1 }, error: undefined },
        { name: "feed", critical: false, durationMs: 0, ok: false, error: "feed offline" },
      ],
    });
  });
});
