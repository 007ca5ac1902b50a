import Ajv, { type ErrorObject, type Schema } from "ajv";

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: Array<{ path: string; message: string }> };

const ajv = new Ajv({ strict: false, allErrors: true });

function describeErrors(errors: ErrorObject[] | null | undefined): Array<{ path: string; message: string }> {
  return (errors ?? []).map((error) => ({
    path: error.instancePath || "/",
    message: error.message ?? "invalid",
  }));
}

/**
 * Compile a JSON schema into a validator that narrows `unknown` to `T`.
 * The caller states `T`; the schema has to describe the same shape.
 */
export function createValidator<T>(schema: Schema): (data: unknown) => ValidationResult<T> {
  const validate = ajv.compile<T>(schema);
  return (data) => {
    if (validate(data)) return { valid: true, value: data, errors: [] };
    return { valid: false, errors: describeErrors(validate.errors) };
  };
}

export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  return errors.map((error) => `${error.path} ${error.message}`).join("; ");
}
