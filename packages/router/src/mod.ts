/**
 * Routing engine for Rivet.
 *
 * Maps a method and a path pattern to an opaque handler. Segments starting
 * with `:` are named captures, a segment starting with `*` captures the rest
 * of the path.
 *
 * @module
 */

export { isHttpMethod, parsePathParams, Router } from "./radix.ts";
export { HTTP_METHODS } from "./types.ts";
export type { HttpMethod, Match } from "./types.ts";
