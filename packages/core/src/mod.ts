/**
 * Rivet Core
 */

import { Type } from "@sinclair/typebox";

/**
 * TypeBox schema builder, accepted by `p.body()`.
 *
 * @example
 * ```typescript
 * import { p, Rest, reply, t } from "@rivet/core";
 *
 * const note = t.Object({ text: t.String({ minLength: 1 }) });
 *
 * new Rest().post("/notes", {
 *   params: [p.body(note)],
 *   returns: "body",
 *   handler: (body) => reply.body({ length: body.text.length }),
 * });
 * ```
 */
export const t = Type;
export type { Static, TSchema } from "@sinclair/typebox";

export { HTTP_METHODS } from "@rivet/router";
export type { HttpMethod } from "@rivet/router";

export * from "./app/mod.ts";
export * from "./binding/mod.ts";
export * from "./client/mod.ts";
export * from "./context/mod.ts";
export * from "./errors/mod.ts";
export * from "./protocol/mod.ts";
export * from "./schema/mod.ts";
