export {
  defineSchema,
  isStandardSchema,
  validate,
} from "./standard.ts";
export type {
  Infer,
  SchemaIssue,
  StandardSchema,
  ValidationResult,
} from "./standard.ts";
export {
  createValidationError,
  formatIssues,
  formatPath,
} from "./errors.ts";
export { fromTypeBox, isTypeBoxSchema } from "./typebox.ts";
