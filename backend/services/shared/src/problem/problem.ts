// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC 7807).
 * - HttpError carries status/title/code for errors that know their HTTP shape;
 *   the problem middleware maps anything else to a 500.
 *
 * Invariants:
 * - No Express imports here.
 */

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  code?: string;
  instance?: string;
  errors?: unknown;
};

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly title: string,
    message: string,
    public readonly code?: string,
    public readonly errors?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export function badRequest(detail: string, errors?: unknown): HttpError {
  return new HttpError(400, "Bad Request", detail, "BAD_REQUEST", errors);
}

export function toProblem(err: unknown, instance?: string): ProblemJson {
  if (err instanceof HttpError) {
    const status = Number.isInteger(err.statusCode) ? err.statusCode : 500;
    return {
      type: "about:blank",
      title: err.title,
      status,
      detail: err.message,
      code: err.code,
      instance,
      errors: err.errors,
    };
  }
  return {
    type: "about:blank",
    title: "Internal Server Error",
    status: 500,
    detail: "Unexpected error",
    instance,
  };
}
