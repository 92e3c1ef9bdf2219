/**
 * Handler replies: one variant per supported return shape.
 */

import { statusCode, type StatusCode } from "../protocol/mod.ts";

/** No body, default status */
export interface NoBodyReply {
  readonly kind: "none";
}

/** Body with the default status */
export interface BodyReply<T = unknown> {
  readonly kind: "body";
  readonly body: T;
}

/** Explicit status, no body */
export interface StatusReply {
  readonly kind: "status";
  readonly status: StatusCode;
}

/** Body with an explicit status */
export interface BodyAndStatusReply<T = unknown> {
  readonly kind: "bodyAndStatus";
  readonly body: T;
  readonly status: StatusCode;
}

export type Reply<T = unknown> =
  | NoBodyReply
  | BodyReply<T>
  | StatusReply
  | BodyAndStatusReply<T>;

export type ReturnShape = Reply["kind"];

export const RETURN_SHAPES: readonly ReturnShape[] = [
  "none",
  "body",
  "status",
  "bodyAndStatus",
];

/**
 * The reply a handler declared with return shape `S` must produce.
 */
export type ReplyFor<S extends ReturnShape> = Extract<Reply, { kind: S }>;

/**
 * What a handler may return: its reply, or an error that takes precedence.
 */
export type HandlerResult<S extends ReturnShape> = ReplyFor<S> | Error;

const SHAPES: ReadonlySet<string> = new Set(RETURN_SHAPES);

export function isReturnShape(value: unknown): value is ReturnShape {
  return typeof value === "string" && SHAPES.has(value);
}

export function isReply(value: unknown): value is Reply {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  switch (value.kind) {
    case "none":
      return true;
    case "body":
      return "body" in value;
    case "status":
      return "status" in value && typeof value.status === "number";
    case "bodyAndStatus":
      return "body" in value && "status" in value &&
        typeof value.status === "number";
    default:
      return false;
  }
}

const NONE: NoBodyReply = Object.freeze({ kind: "none" });

/**
 * Reply constructors.
 *
 * @example
 * ```typescript
 * reply.none();                 // 204
 * reply.body({ id: 1 });        // 200, 201 for POST
 * reply.status(418);            // 418, no body
 * reply.with({ id: 1 }, 202);   // 202 with body
 * ```
 */
export const reply = {
  none(): NoBodyReply {
    return NONE;
  },
  body<T>(body: T): BodyReply<T> {
    return { kind: "body", body };
  },
  /**
   * @throws {RangeError} If the status is not an integer between 200 and 599
   */
  status(status: number): StatusReply {
    return { kind: "status", status: statusCode(status) };
  },
  /**
   * @throws {RangeError} If the status is not an integer between 200 and 599
   */
  with<T>(body: T, status: number): BodyAndStatusReply<T> {
    return { kind: "bodyAndStatus", body, status: statusCode(status) };
  },
};
