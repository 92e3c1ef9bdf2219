import type { StandardSchemaV1 } from "@standard-schema/spec";
import { ValidationError } from "../errors/mod.ts";
import type { ValidationIssue } from "../errors/mod.ts";
import type { SchemaIssue } from "./standard.ts";

type PathSegment = PropertyKey | StandardSchemaV1.PathSegment;

/**
 * Convert a path array to dot-notation string.
 *
 * @example
 * formatPath(['user', 'email']) // "user.email"
 * formatPath(['items', 0, 'name']) // "items[0].name"
 * formatPath([]) // "(root)"
 */
export function formatPath(path?: ReadonlyArray<PathSegment>): string {
  if (!path || path.length === 0) {
    return "(root)";
  }

  return path.reduce<string>((acc, segment, index) => {
    const key =
      typeof segment === "object" && segment !== null && "key" in segment
        ? segment.key
        : segment;

    if (typeof key === "number") {
      return `${acc}[${key}]`;
    }
    if (index === 0) {
      return String(key);
    }
    return `${acc}.${String(key)}`;
  }, "");
}

/**
 * Format schema issues for an error response.
 */
export function formatIssues(issues: SchemaIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
  }));
}

/**
 * Create the 422 error thrown for a value rejected by its schema.
 */
export function createValidationError(issues: SchemaIssue[]): ValidationError {
  return new ValidationError(formatIssues(issues));
}
