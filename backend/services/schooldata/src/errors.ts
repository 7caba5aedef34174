// backend/services/schooldata/src/errors.ts
/**
 * Error taxonomy for the sync engine and read path.
 * All extend HttpError so the shared problem middleware can render them.
 */

import { HttpError } from "@shared/problem/problem";
import type { DataType } from "./contracts/dataType";
import type { IsoDate } from "./utils/dates";

export class SchoolDataError extends HttpError {}

export type UpstreamErrorKind = "transient" | "permanent";

/** A connector call failed. Transient errors are retried by the engine. */
export class UpstreamError extends SchoolDataError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;
  public readonly providerCode?: string;

  constructor(
    public readonly kind: UpstreamErrorKind,
    public readonly provider: string,
    message: string,
    opts: { status?: number; retryAfterMs?: number; providerCode?: string } = {}
  ) {
    super(502, "Bad Gateway", message, "UPSTREAM_" + kind.toUpperCase());
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
    this.providerCode = opts.providerCode;
  }

  get isTransient(): boolean {
    return this.kind === "transient";
  }
}

/** A raw record had a shape the normalizer does not recognize. Permanent for that cell. */
export class NormalizationError extends SchoolDataError {
  constructor(
    public readonly dataType: DataType,
    public readonly date: IsoDate,
    message: string
  ) {
    super(500, "Normalization Failed", message, "NORMALIZATION_FAILED");
  }
}

export class StoreError extends SchoolDataError {
  constructor(
    public readonly op: string,
    message: string,
    public readonly source?: unknown
  ) {
    super(503, "Service Unavailable", message, "STORE_UNAVAILABLE");
  }
}

export class RangeValidationError extends SchoolDataError {
  constructor(message: string) {
    super(400, "Bad Request", message, "INVALID_RANGE");
  }
}

/** The caller stopped waiting (timeout or disconnect); shared work continues. */
export class SyncDetachedError extends SchoolDataError {
  constructor(message = "caller detached from sync") {
    super(503, "Service Unavailable", message, "SYNC_DETACHED");
  }
}

export class ServiceUnavailableError extends SchoolDataError {
  constructor(message: string) {
    super(503, "Service Unavailable", message, "SERVICE_UNAVAILABLE");
  }
}
