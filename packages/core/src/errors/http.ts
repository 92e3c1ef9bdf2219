/**
 * HTTP error classes.
 */

import { HttpError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * 400 Bad Request error.
 */
export class BadRequestError extends HttpError {
  constructor(message = "Bad Request") {
    super(message, 400, "BAD_REQUEST");
    this.name = "BadRequestError";
  }
}

/**
 * 401 Unauthorized error.
 */
export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized") {
    super(message, 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

/**
 * 403 Forbidden error.
 */
export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(message, 403, "FORBIDDEN");
    this.name = "ForbiddenError";
  }
}

/**
 * 404 Not Found error.
 */
export class NotFoundError extends HttpError {
  constructor(message = "Not Found") {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * 409 Conflict error.
 */
export class ConflictError extends HttpError {
  constructor(message = "Conflict") {
    super(message, 409, "CONFLICT");
    this.name = "ConflictError";
  }
}

/**
 * 422 Unprocessable Entity error.
 */
export class UnprocessableEntityError extends HttpError {
  constructor(message = "Unprocessable Entity") {
    super(message, 422, "UNPROCESSABLE_ENTITY");
    this.name = "UnprocessableEntityError";
  }
}

/**
 * 422 error raised when a decoded value does not match its schema.
 */
export class ValidationError extends HttpError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], message = formatMessage(issues)) {
    super(message, 422, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

function formatMessage(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Validation failed";
  }
  return `Validation failed: ${
    issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")
  }`;
}

/**
 * 500 Internal Server Error.
 */
export class InternalError extends HttpError {
  constructor(message = "Internal Server Error") {
    super(message, 500, "INTERNAL_ERROR");
    this.name = "InternalError";
  }
}
