/**
 * Base error class for Rivet.
 */

import type { ErrorResponse } from "./types.ts";

/**
 * An error that carries the HTTP status it should be answered with.
 *
 * Serializes to the `{ status, message }` body sent for every failed
 * request, so a handler can throw or return one to pick its status.
 *
 * @example
 * ```typescript
 * throw new HttpError("invalid", 400, "BAD_REQUEST");
 * ```
 */
export class HttpError extends Error {
  /** HTTP status code */
  readonly status: number;
  /** Machine-readable error code */
  readonly code: string;

  constructor(message: string, status = 500, code = "INTERNAL_ERROR") {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): ErrorResponse {
    return { status: this.status, message: this.message };
  }

  toString(): string {
    return `${this.status}: ${this.message}`;
  }
}

/**
 * Create an error answered with the given status.
 */
export function httpError(status: number, message: string): HttpError {
  return new HttpError(message, status, codeForStatus(status));
}

const STATUS_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  405: "METHOD_NOT_ALLOWED",
  409: "CONFLICT",
  418: "IM_A_TEAPOT",
  422: "UNPROCESSABLE_ENTITY",
  429: "TOO_MANY_REQUESTS",
  500: "INTERNAL_ERROR",
  502: "BAD_GATEWAY",
  503: "SERVICE_UNAVAILABLE",
};

export function codeForStatus(status: number): string {
  return STATUS_CODES[status] ?? (status < 500 ? "CLIENT_ERROR" : "SERVER_ERROR");
}
