// backend/services/schooldata/test/upstreamHttp.spec.ts
import { describe, it, expect } from "vitest";
import { UpstreamError } from "../src/errors";
import { UpstreamHttp, parseRetryAfter } from "../src/connectors/upstreamHttp";
import { stubAxios, type StubReply } from "./helpers/axiosStub";

const NOW = Date.parse("2024-03-01T00:00:00Z");

function client(reply: StubReply) {
  const { http, requests } = stubAxios([reply]);
  return { upstream: new UpstreamHttp({ provider: "neis", timeoutMs: 1_000, http, now: () => NOW }), requests };
}

async function failure(reply: StubReply): Promise<UpstreamError> {
  const { upstream } = client(reply);
  const err: unknown = await upstream.getJson("https://example.test/x").then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof UpstreamError)) throw new Error("expected UpstreamError");
  return err;
}

describe("UpstreamHttp", () => {
  it("returns the JSON body and forwards params", async () => {
    const { upstream, requests } = client({ status: 200, data: { ok: 1 } });
    await expect(upstream.getJson("https://example.test/x", { KEY: "test-secret" })).resolves.toEqual({ ok: 1 });
    expect(requests).toEqual([{ url: "https://example.test/x", params: { KEY: "test-secret" } }]);
  });

  it("maps 5xx and 429 to transient, with Retry-After", async () => {
    const e503 = await failure({ status: 503, data: {} });
    expect([e503.kind, e503.status, e503.message]).toEqual(["transient", 503, "HTTP 503"]);

    const e429 = await failure({ status: 429, data: {}, headers: { "retry-after": "2" } });
    expect([e429.kind, e429.retryAfterMs]).toEqual(["transient", 2_000]);
  });

  it("maps other 4xx to permanent", async () => {
    const e = await failure({ status: 401, data: {} });
    expect([e.kind, e.status, e.code]).toEqual(["permanent", 401, "UPSTREAM_PERMANENT"]);
  });

  it("treats a non-JSON body as transient", async () => {
    const e = await failure({ status: 200, data: "<html>maintenance</html>" });
    expect([e.kind, e.message]).toEqual(["transient", "non-JSON response body"]);
  });

  it("maps timeouts and network errors to transient", async () => {
    const timeout = await failure({ error: "ECONNABORTED", message: "timeout of 1000ms exceeded" });
    expect([timeout.kind, timeout.message]).toEqual(["transient", "timeout: timeout of 1000ms exceeded"]);

    const reset = await failure({ error: "ECONNRESET", message: "socket hang up" });
    expect([reset.kind, reset.message]).toEqual(["transient", "ECONNRESET: socket hang up"]);
  });
});

describe("parseRetryAfter", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfter("3", NOW)).toBe(3_000);
    expect(parseRetryAfter("Fri, 01 Mar 2024 00:00:05 GMT", NOW)).toBe(5_000);
    expect(parseRetryAfter("soon", NOW)).toBeUndefined();
    expect(parseRetryAfter(undefined, NOW)).toBeUndefined();
  });
});
