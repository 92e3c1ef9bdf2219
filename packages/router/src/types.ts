/**
 * Type definitions for the router module.
 */

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export interface Match<THandler> {
  handler: THandler;
  params: Record<string, string>;
}
