// backend/services/shared/test/env.spec.ts
import { describe, it, expect } from "vitest";
import { assertEnv, envFileNamesFor } from "../src/env";

describe("env helpers", () => {
  it("lists candidate files per mode", () => {
    expect(envFileNamesFor("dev")).toEqual(["env.dev", ".env.dev", ".env"]);
    expect(envFileNamesFor("docker")).toEqual(["env.docker", ".env.docker", ".env"]);
    expect(envFileNamesFor("production")).toEqual([".env"]);
  });

  it("reports every missing or blank key at once", () => {
    expect(() => assertEnv(["A", "B", "C"], { A: "1", B: "  " })).toThrow("Missing required env vars: B, C");
    expect(() => assertEnv(["A"], { A: "1" })).not.toThrow();
  });
});
