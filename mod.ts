/**
 * Rivet - serve plain functions as typed HTTP handlers.
 *
 * @example
 * ```typescript
 * import { p, Rest, reply } from "@rivet/core";
 *
 * const app = new Rest();
 *
 * app.get("/hello/:name", {
 *   params: [p.string()],
 *   returns: "body",
 *   handler: (name) => reply.body({ message: `Hello, ${name}!` }),
 * });
 *
 * await app.listen({ port: 8000 });
 * ```
 *
 * @module
 */

export * from "@rivet/core";
