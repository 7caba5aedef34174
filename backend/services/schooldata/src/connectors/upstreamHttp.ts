// backend/services/schooldata/src/connectors/upstreamHttp.ts
/**
 * Thin axios wrapper shared by connectors.
 * Maps every failure onto UpstreamError:
 * - timeout / network error / 429 / 5xx / non-JSON body → transient
 * - any other 4xx → permanent
 */

import axios, { isAxiosError, type AxiosInstance } from "axios";
import { UpstreamError } from "../errors";

const TRANSIENT_NET_CODES = new Set([
  "ECONNABORTED",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "ENOTFOUND",
  "ERR_NETWORK",
  "ERR_CANCELED",
]);

export type UpstreamHttpOptions = {
  provider: string;
  timeoutMs: number;
  /** Injected in tests (axios instance with an in-process adapter). */
  http?: AxiosInstance;
  now?: () => number;
};

export class UpstreamHttp {
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(private readonly opts: UpstreamHttpOptions) {
    this.http = opts.http ?? axios.create();
    this.now = opts.now ?? Date.now;
  }

  get provider(): string {
    return this.opts.provider;
  }

  async getJson(url: string, params?: Record<string, string>): Promise<unknown> {
    const res = await this.http
      .get<unknown>(url, {
        params,
        timeout: this.opts.timeoutMs,
        validateStatus: () => true,
        headers: { Accept: "application/json" },
      })
      .catch((err: unknown) => {
        throw this.fromThrown(err);
      });

    const status = res.status;
    if (status === 429 || status >= 500) {
      throw new UpstreamError("transient", this.provider, `HTTP ${status}`, {
        status,
        retryAfterMs: parseRetryAfter(res.headers["retry-after"], this.now()),
      });
    }
    if (status >= 400) {
      throw new UpstreamError("permanent", this.provider, `HTTP ${status}`, { status });
    }

    const data: unknown = res.data;
    if (data === null || typeof data !== "object") {
      throw new UpstreamError("transient", this.provider, "non-JSON response body", { status });
    }
    return data;
  }

  private fromThrown(err: unknown): UpstreamError {
    if (isAxiosError(err)) {
      const code = err.code ?? "";
      const kind = TRANSIENT_NET_CODES.has(code) || !err.response ? "transient" : "permanent";
      const label = code === "ECONNABORTED" || code === "ETIMEDOUT" ? "timeout" : code || "request failed";
      return new UpstreamError(kind, this.provider, `${label}: ${err.message}`);
    }
    return new UpstreamError(
      "transient",
      this.provider,
      err instanceof Error ? err.message : String(err)
    );
  }
}

/** Retry-After as delta seconds or an HTTP date; undefined when absent or unparsable. */
export function parseRetryAfter(header: unknown, nowMs: number): number | undefined {
  if (typeof header !== "string" || !header.trim()) return undefined;
  const v = header.trim();
  if (/^\d+(\.\d+)?$/.test(v)) return Math.round(Number(v) * 1000);
  const at = Date.parse(v);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - nowMs);
}
