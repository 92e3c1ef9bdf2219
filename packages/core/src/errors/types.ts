/**
 * Error type definitions.
 */

import type { HttpError } from "./base.ts";

/**
 * Validation issue structure.
 */
export interface ValidationIssue {
  /** Field path (e.g., "user.email" or "items[0].name") */
  path: string;
  message: string;
}

/**
 * Body of every error response (status >= 400).
 */
export interface ErrorResponse {
  status: number;
  message: string;
}

/**
 * Error transformer function type.
 */
export type ErrorTransformer = (
  error: unknown,
  fallbackStatus?: number,
) => HttpError;
