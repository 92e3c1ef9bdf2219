import { Kind, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { StandardSchema } from "./standard.ts";

/**
 * Check whether a value is a TypeBox schema.
 */
export function isTypeBoxSchema(value: unknown): value is TSchema {
  return typeof value === "object" && value !== null && Kind in value;
}

/**
 * Expose a TypeBox schema as a Standard Schema.
 *
 * Accepted values are passed through `Value.Cast`.
 *
 * @example
 * ```typescript
 * const target = fromTypeBox(t.Object({ name: t.String() }));
 * ```
 */
export function fromTypeBox<T extends TSchema>(
  schema: T,
): StandardSchema<unknown, Static<T>> {
  return {
    "~standard": {
      version: 1,
      vendor: "typebox",
      validate(value: unknown) {
        const errors = [...Value.Errors(schema, value)];
        if (errors.length === 0) {
          return { value: Value.Cast(schema, value) };
        }
        return {
          issues: errors.map((err) => ({
            message: err.message,
            path: err.path.split("/").filter((part) => part.length > 0),
          })),
        };
      },
    },
  };
}
