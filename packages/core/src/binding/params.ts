/**
 * Parameter specs: the declared type of each handler argument.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import type { RequestContext } from "../context/mod.ts";
import type { BodyTarget } from "../protocol/mod.ts";
import {
  defineSchema,
  fromTypeBox,
  isStandardSchema,
  isTypeBoxSchema,
} from "../schema/mod.ts";
import {
  type BigIntegerKind,
  type FloatKind,
  type IntegerKind,
  parseBigInteger,
  parseFloatKind,
  parseInteger,
  type ScalarKind,
} from "./scalar.ts";

export type ParamKind = "context" | "request" | "body" | ScalarKind;

const VENDOR = "rivet";

/**
 * Declared type of one handler parameter.
 *
 * `parse` converts a path segment and is present for scalar kinds only.
 * `target` decodes the request body and is present for every kind that can
 * be the body parameter.
 */
export interface ParamSpec<T> {
  readonly kind: ParamKind;
  readonly parse?: (text: string, param: string) => T;
  readonly target?: BodyTarget<T>;
}

/**
 * Handler argument list produced by a tuple of specs.
 *
 * @example
 * BoundArgs<[ParamSpec<number>, ParamSpec<string>]> // [number, string]
 */
export type BoundArgs<P extends readonly ParamSpec<unknown>[]> = {
  -readonly [K in keyof P]: P[K] extends ParamSpec<infer T> ? T : never;
};

export function isParamSpec(value: unknown): value is ParamSpec<unknown> {
  return typeof value === "object" && value !== null && "kind" in value &&
    typeof value.kind === "string";
}

function integer(kind: IntegerKind): ParamSpec<number> {
  return {
    kind,
    parse: (text, param) => parseInteger(kind, text, param),
    target: defineSchema(VENDOR, (value) => {
      if (typeof value !== "number" || !Number.isInteger(value)) {
        return { message: `expected ${kind}` };
      }
      return checked(() => parseInteger(kind, String(value)));
    }),
  };
}

function bigInteger(kind: BigIntegerKind): ParamSpec<bigint> {
  return {
    kind,
    parse: (text, param) => parseBigInteger(kind, text, param),
    target: defineSchema(VENDOR, (value) => {
      if (typeof value === "string") {
        return checked(() => parseBigInteger(kind, value));
      }
      if (typeof value !== "number" || !Number.isInteger(value)) {
        return { message: `expected ${kind}` };
      }
      return checked(() => parseBigInteger(kind, String(value)));
    }),
  };
}

function float(kind: FloatKind): ParamSpec<number> {
  return {
    kind,
    parse: (text, param) => parseFloatKind(kind, text, param),
    target: defineSchema(VENDOR, (value) => {
      if (typeof value !== "number") {
        return { message: `expected ${kind}` };
      }
      return checked(() => parseFloatKind(kind, String(value)));
    }),
  };
}

function checked<T>(convert: () => T): { value: T } | { message: string } {
  try {
    return { value: convert() };
  } catch (error) {
    return { message: error instanceof Error ? error.message : String(error) };
  }
}

const anyBody: BodyTarget<unknown> = defineSchema(
  VENDOR,
  (value) => ({ value }),
);

function body(): ParamSpec<unknown>;
function body<T extends TSchema>(schema: T): ParamSpec<Static<T>>;
function body<T>(target: BodyTarget<T>): ParamSpec<T>;
function body(target?: BodyTarget<unknown> | TSchema): ParamSpec<unknown> {
  if (target === undefined) {
    return { kind: "body", target: anyBody };
  }
  if (isTypeBoxSchema(target)) {
    return { kind: "body", target: fromTypeBox(target) };
  }
  if (isStandardSchema(target)) {
    return { kind: "body", target };
  }
  throw new TypeError(
    "p.body() expects a Standard Schema or a TypeBox schema",
  );
}

const CONTEXT: ParamSpec<RequestContext> = Object.freeze({ kind: "context" });
const REQUEST: ParamSpec<Request> = Object.freeze({ kind: "request" });

const STRING: ParamSpec<string> = Object.freeze({
  kind: "string",
  parse: (text: string) => text,
  target: defineSchema<string>(VENDOR, (value) =>
    typeof value === "string"
      ? { value }
      : { message: "expected string" }),
});

/**
 * Parameter spec constructors.
 *
 * Specs bind in declared order: `context` and `request` take the
 * per-request values, the next specs take the named path segments left to
 * right, and one further spec takes the decoded request body.
 *
 * @example
 * ```typescript
 * app.put("/users/:id", {
 *   params: [p.context(), p.uint32(), p.body(userSchema)],
 *   returns: "status",
 *   handler: async (ctx, id, user) => {
 *     await users.save(id, user, ctx.signal);
 *     return reply.status(204);
 *   },
 * });
 * ```
 */
export const p = {
  /** The {@link RequestContext} of the current request */
  context: (): ParamSpec<RequestContext> => CONTEXT,
  /** The raw Fetch API request */
  request: (): ParamSpec<Request> => REQUEST,
  string: (): ParamSpec<string> => STRING,
  /** JavaScript safe integer */
  int: (): ParamSpec<number> => integer("int"),
  int8: (): ParamSpec<number> => integer("int8"),
  int16: (): ParamSpec<number> => integer("int16"),
  int32: (): ParamSpec<number> => integer("int32"),
  int64: (): ParamSpec<bigint> => bigInteger("int64"),
  /** Non-negative JavaScript safe integer */
  uint: (): ParamSpec<number> => integer("uint"),
  uint8: (): ParamSpec<number> => integer("uint8"),
  uint16: (): ParamSpec<number> => integer("uint16"),
  uint32: (): ParamSpec<number> => integer("uint32"),
  uint64: (): ParamSpec<bigint> => bigInteger("uint64"),
  float32: (): ParamSpec<number> => float("float32"),
  float64: (): ParamSpec<number> => float("float64"),
  /** Decoded request body, checked against an optional schema */
  body,
};
