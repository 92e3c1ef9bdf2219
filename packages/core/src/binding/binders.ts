/**
 * Binders: per-parameter strategies that produce an argument from a request.
 */

import type { RequestContext } from "../context/mod.ts";
import type { BodyTarget, ServerDecoder } from "../protocol/mod.ts";

export type BindResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Produces one handler argument. Binders keep no per-request state, so one
 * instance serves every request of its route.
 */
export type Binder<T = unknown> = (
  ctx: RequestContext,
) => BindResult<T> | Promise<BindResult<T>>;

export const contextBinder: Binder<RequestContext> = (ctx) => ({
  ok: true,
  value: ctx,
});

export const requestBinder: Binder<Request> = (ctx) => ({
  ok: true,
  value: ctx.request,
});

/**
 * Bind a named path segment through a scalar conversion.
 */
export function pathBinder<T>(
  name: string,
  parse: (text: string, param: string) => T,
): Binder<T> {
  return (ctx) => {
    try {
      return { ok: true, value: parse(ctx.params[name] ?? "", name) };
    } catch (error) {
      return { ok: false, error };
    }
  };
}

/**
 * Bind the request payload decoded by the protocol into the target.
 */
export function bodyBinder<T>(
  decoder: ServerDecoder,
  target: BodyTarget<T>,
): Binder<T> {
  return async (ctx) => {
    try {
      return { ok: true, value: await decoder.decodeRequest(ctx.request, target) };
    } catch (error) {
      return { ok: false, error };
    }
  };
}
