import type { StandardSchemaV1 } from "@standard-schema/spec";

/**
 * Any library implementing Standard Schema (Zod, Valibot, ArkType, etc.)
 * can be used directly without wrappers.
 */
export type StandardSchema<TInput = unknown, TOutput = TInput> =
  StandardSchemaV1<TInput, TOutput>;

/**
 * Infer the output type from any Standard Schema compliant schema.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * const schema = z.object({ name: z.string() });
 * type User = Infer<typeof schema>; // { name: string }
 * ```
 */
export type Infer<S> = S extends StandardSchemaV1<unknown, infer TOutput>
  ? TOutput
  : never;

/**
 * Issue as returned by Standard Schema.
 */
export interface SchemaIssue {
  readonly message: string;
  readonly path?: ReadonlyArray<PropertyKey | StandardSchemaV1.PathSegment>;
}

/**
 * Result of a validation operation.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: SchemaIssue[] };

/**
 * Check if a value implements the Standard Schema interface.
 */
export function isStandardSchema(value: unknown): value is StandardSchema {
  if (typeof value !== "object" || value === null || !("~standard" in value)) {
    return false;
  }
  const props = value["~standard"];
  return typeof props === "object" && props !== null &&
    "validate" in props && typeof props.validate === "function";
}

/**
 * Validate data against a Standard Schema.
 *
 * @example
 * ```typescript
 * const result = await validate(z.object({ name: z.string() }), { name: "Ada" });
 * if (result.success) {
 *   console.log(result.data.name); // "Ada"
 * }
 * ```
 */
export async function validate<T>(
  schema: StandardSchema<unknown, T>,
  data: unknown,
): Promise<ValidationResult<T>> {
  const result = await schema["~standard"].validate(data);

  if (result.issues) {
    return {
      success: false,
      issues: result.issues.map((issue) => ({
        message: issue.message,
        path: issue.path,
      })),
    };
  }

  return { success: true, data: result.value };
}

/**
 * Build a Standard Schema from a plain check function.
 *
 * The check returns the accepted value or a message describing why the
 * input was rejected.
 */
export function defineSchema<T>(
  vendor: string,
  check: (value: unknown) => { value: T } | { message: string },
): StandardSchema<unknown, T> {
  return {
    "~standard": {
      version: 1,
      vendor,
      validate(value: unknown) {
        const result = check(value);
        if ("message" in result) {
          return { issues: [{ message: result.message }] };
        }
        return { value: result.value };
      },
    },
  };
}
