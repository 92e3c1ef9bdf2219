import { isResponseStatus } from "../errors/mod.ts";
import type { StatusCode } from "./types.ts";

export const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205, 304]);

export function isStatusCode(value: unknown): value is StatusCode {
  return typeof value === "number" && isResponseStatus(value);
}

/**
 * Validate an explicit response status.
 *
 * @throws {RangeError} If the value is not an integer between 200 and 599
 */
export function statusCode(value: number): StatusCode {
  if (!isStatusCode(value)) {
    throw new RangeError(`Invalid status code: ${value}`);
  }
  return value;
}
