/**
 * Handler adapter builder.
 *
 * Turns a route definition into a dispatcher once, at registration:
 * parameters are classified against the path pattern, one binder is built
 * per parameter and the return shape is checked. Any problem is a
 * {@link RegistrationError}.
 */

import { parsePathParams } from "@rivet/router";
import type { Logger } from "../app/types.ts";
import type { RequestContext } from "../context/mod.ts";
import {
  InternalError,
  isHttpError,
  RegistrationError,
} from "../errors/mod.ts";
import { isStatusCode, type ServerProtocol } from "../protocol/mod.ts";
import {
  type Binder,
  bodyBinder,
  contextBinder,
  pathBinder,
  requestBinder,
} from "./binders.ts";
import {
  type BoundArgs,
  isParamSpec,
  type ParamKind,
  type ParamSpec,
} from "./params.ts";
import {
  type HandlerResult,
  isReply,
  isReturnShape,
  type ReturnShape,
  RETURN_SHAPES,
} from "./reply.ts";

/**
 * A route's handler together with its declared parameters and return shape.
 *
 * @example
 * ```typescript
 * const addOne = defineRoute({
 *   params: [p.int()],
 *   returns: "body",
 *   handler: (id) => reply.body(id + 1),
 * });
 * ```
 */
export interface RouteDefinition<
  P extends readonly ParamSpec<unknown>[] = readonly [],
  S extends ReturnShape = ReturnShape,
> {
  readonly params?: P;
  readonly returns: S;
  handler(...args: BoundArgs<P>): HandlerResult<S> | Promise<HandlerResult<S>>;
}

export type AnyRouteDefinition = RouteDefinition<
  readonly ParamSpec<unknown>[],
  ReturnShape
>;

/**
 * Identity helper that infers the handler's argument types from `params`.
 */
export function defineRoute<
  const P extends readonly ParamSpec<unknown>[] = readonly [],
  S extends ReturnShape = ReturnShape,
>(definition: RouteDefinition<P, S>): RouteDefinition<P, S> {
  return definition;
}

/**
 * Where one handler argument comes from.
 */
export type Role =
  | { readonly type: "context" }
  | { readonly type: "request" }
  | { readonly type: "path"; readonly name: string; readonly kind: ParamKind }
  | { readonly type: "body"; readonly kind: ParamKind };

export interface SignatureDescriptor {
  readonly roles: readonly Role[];
  readonly returns: ReturnShape;
}

export type Dispatcher = (ctx: RequestContext) => Promise<Response>;

export interface AdapterOptions {
  protocol: ServerProtocol;
  logger: Logger;
}

/**
 * Classify every declared parameter of a route.
 *
 * Context and request specs take the per-request values. Every other spec
 * takes the next unbound path segment while any remain, then the body.
 *
 * @throws {RegistrationError}
 */
export function classifySignature(
  method: string,
  path: string,
  definition: AnyRouteDefinition,
): SignatureDescriptor {
  const fail = (reason: string) => new RegistrationError(method, path, reason);

  if (typeof definition.handler !== "function") {
    throw fail("handler must be a function");
  }
  if (!isReturnShape(definition.returns)) {
    throw fail(
      `expected a return shape of ${
        RETURN_SHAPES.map((shape) => `"${shape}"`).join(", ")
      } but got ${JSON.stringify(definition.returns)}`,
    );
  }

  if (definition.params !== undefined && !Array.isArray(definition.params)) {
    throw fail("params must be an array of parameter specs");
  }
  const specs: readonly unknown[] = definition.params ?? [];

  const segments = parsePathParams(path);
  const roles: Role[] = [];
  let next = 0;
  let haveBody = false;

  specs.forEach((spec: unknown, index: number) => {
    if (!isParamSpec(spec)) {
      throw fail(`parameter ${index} is not a parameter spec`);
    }
    if (spec.kind === "context") {
      roles.push({ type: "context" });
    } else if (spec.kind === "request") {
      roles.push({ type: "request" });
    } else if (next < segments.length) {
      const name = segments[next++];
      if (!spec.parse) {
        throw fail(
          `unsupported path parameter type ${spec.kind} for parameter ${name}`,
        );
      }
      roles.push({ type: "path", name, kind: spec.kind });
    } else if (haveBody) {
      throw fail(
        `cannot determine a binding source for parameter ${index} (${spec.kind}): all path parameters and the request body are already bound`,
      );
    } else if (!spec.target) {
      throw fail(`could not determine decoder for type ${spec.kind}`);
    } else {
      roles.push({ type: "body", kind: spec.kind });
      haveBody = true;
    }
  });

  return Object.freeze({
    roles: Object.freeze(roles),
    returns: definition.returns,
  });
}

function buildBinder(
  role: Role,
  spec: ParamSpec<unknown>,
  protocol: ServerProtocol,
): Binder {
  switch (role.type) {
    case "context":
      return contextBinder;
    case "request":
      return requestBinder;
    case "path":
      if (!spec.parse) {
        throw new TypeError(`${spec.kind} has no path conversion`);
      }
      return pathBinder(role.name, spec.parse);
    case "body":
      if (!spec.target) {
        throw new TypeError(`${spec.kind} has no body decoder`);
      }
      return bodyBinder(protocol, spec.target);
  }
}

function describe(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null && "kind" in value) {
    return `a "${String(value.kind)}" reply`;
  }
  return value === undefined ? "undefined" : typeof value;
}

type Settled = { status: number; body: unknown } | Error;

function settle(result: unknown, shape: ReturnShape): Settled {
  if (!isReply(result) || result.kind !== shape) {
    return new InternalError(
      `expected a "${shape}" reply but the handler returned ${describe(result)}`,
    );
  }
  switch (result.kind) {
    case "none":
      return { status: 0, body: undefined };
    case "body":
      return { status: 0, body: result.body };
    case "status":
      return isStatusCode(result.status)
        ? { status: result.status, body: undefined }
        : new InternalError(`invalid status code ${result.status}`);
    case "bodyAndStatus":
      return isStatusCode(result.status)
        ? { status: result.status, body: result.body }
        : new InternalError(`invalid status code ${result.status}`);
  }
}

/**
 * Build the request-time function for one route.
 *
 * Binders run in declared order and the first failure answers 422 without
 * calling the handler. A thrown, rejected or returned error wins over any
 * reply; otherwise the reply is handed to the protocol encoder.
 *
 * @throws {RegistrationError}
 */
export function buildDispatcher(
  method: string,
  path: string,
  definition: AnyRouteDefinition,
  options: AdapterOptions,
): Dispatcher {
  const { protocol, logger } = options;
  const descriptor = classifySignature(method, path, definition);
  const specs = definition.params ?? [];
  const binders = descriptor.roles.map((role, i) =>
    buildBinder(role, specs[i], protocol)
  );
  const log = logger.child({ route: `${method} ${path}` });

  const fail = (request: Request, error: unknown): Promise<Response> => {
    if (!isHttpError(error) || error.status >= 500) {
      log.error("Handler failed", { error: describe(error) });
    }
    return protocol.encodeResponse(request, 0, error, undefined);
  };

  return async (ctx) => {
    const { request } = ctx;
    const args: unknown[] = [];

    for (const binder of binders) {
      const bound = await binder(ctx);
      if (!bound.ok) {
        log.warn("Request binding failed", { error: describe(bound.error) });
        return protocol.encodeResponse(request, 422, bound.error, undefined);
      }
      args.push(bound.value);
    }

    let result: unknown;
    try {
      result = await definition.handler(...args);
    } catch (error) {
      return fail(
        request,
        error ?? new InternalError(`handler threw ${String(error)}`),
      );
    }

    if (result instanceof Error) {
      return fail(request, result);
    }

    const settled = settle(result, descriptor.returns);
    if (settled instanceof Error) {
      return fail(request, settled);
    }
    return protocol.encodeResponse(
      request,
      settled.status,
      undefined,
      settled.body,
    );
  };
}
