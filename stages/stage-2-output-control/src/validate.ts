/**
 * Validate decoded data against JSON Schema (using ajv).
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";
import type { JsonSchema, ValidationResult } from "./types.js";

interface AjvInstance {
  compile<T = unknown>(schema: JsonSchema): ValidateFunction<T>;
}

type AjvConstructorType = new (opts?: { allErrors?: boolean }) => AjvInstance;

// ajv is CommonJS; under NodeNext the default import may be the module object.
const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (AjvImport as unknown as { default: AjvConstructorType }).default
) as AjvConstructorType;

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ["Validation failed"];
  }
  return errors.map(
    (e) =>
      `${e.instancePath || "/"} ${e.message ?? e.keyword}${
        e.params ? ` (${JSON.stringify(e.params)})` : ""
      }`
  );
}

/** Validate data against a JSON Schema; on success the data comes back typed. */
export function validateAgainstSchema<T = unknown>(
  data: unknown,
  schema: JsonSchema
): ValidationResult<T> {
  const ajv = new AjvConstructor({ allErrors: true });
  try {
    const validate = ajv.compile<T>(schema);
    if (validate(data)) {
      return { valid: true, data };
    }
    return { valid: false, errors: formatAjvErrors(validate.errors) };
  } catch (err) {
    const message =
      err instanceof Error ? err.message : "Unknown validation error";
    return { valid: false, errors: [message] };
  }
}
