/**
 * Error transformation utilities.
 */

import { codeForStatus, HttpError } from "./base.ts";

/**
 * Convert any thrown or returned value to an {@link HttpError}.
 *
 * An `HttpError` keeps its own status when a response can carry it, and
 * becomes a 500 otherwise. Anything else is wrapped with `fallbackStatus`,
 * or 500 when none is given, and keeps its message.
 */
export function toHttpError(error: unknown, fallbackStatus = 0): HttpError {
  if (error instanceof HttpError) {
    return isResponseStatus(error.status)
      ? error
      : new HttpError(error.message, 500, "INTERNAL_ERROR");
  }

  const status = isErrorStatus(fallbackStatus) ? fallbackStatus : 500;
  const message = error instanceof Error ? error.message : String(error);
  return new HttpError(message, status, codeForStatus(status));
}

/**
 * Type guard to check if a value is an HttpError.
 */
export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export function isErrorStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 400 && status <= 599;
}

/**
 * Whether a Fetch `Response` accepts the status: an integer from 200 to 599.
 */
export function isResponseStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 200 && status <= 599;
}
