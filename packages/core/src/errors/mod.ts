/**
 * Errors module - structured error handling.
 */

export { codeForStatus, HttpError, httpError } from "./base.ts";
export {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  InternalError,
  NotFoundError,
  UnauthorizedError,
  UnprocessableEntityError,
  ValidationError,
} from "./http.ts";
export { RegistrationError } from "./registration.ts";
export {
  isErrorStatus,
  isHttpError,
  isResponseStatus,
  toHttpError,
} from "./transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "./types.ts";
