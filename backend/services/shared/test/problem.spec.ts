// backend/services/shared/test/problem.spec.ts
import { describe, it, expect } from "vitest";
import { HttpError, badRequest, toProblem } from "../src/problem/problem";

describe("toProblem", () => {
  it("maps HttpError fields", () => {
    expect(toProblem(badRequest("invalid query", { date: ["bad"] }), "req-1")).toEqual({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      detail: "invalid query",
      code: "BAD_REQUEST",
      instance: "req-1",
      errors: { date: ["bad"] },
    });
  });

  it("keeps subclass names", () => {
    class TeapotError extends HttpError {}
    expect(new TeapotError(418, "Teapot", "short and stout").name).toBe("TeapotError");
  });

  it("hides unknown errors behind a 500", () => {
    expect(toProblem(new Error("secret detail"))).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Unexpected error",
      instance: undefined,
    });
  });
});
