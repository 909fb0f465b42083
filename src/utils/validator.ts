import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Validation runs synchronously, since it backs client construction:
 * - A schema that throws returns `[ValidationError, null]` with the thrown error as `cause`.
 * - A schema that answers with a Promise is rejected outright.
 * - A result with `issues` returns `[ValidationError, null]` carrying those issues.
 * - Otherwise returns `[null, result.value]`.
 *
 * @param input - The value to validate.
 * @param schema - The StandardSchemaV1 schema used for validation.
 * @param subject - What is being validated, used in error messages.
 */
export function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  subject = 'data',
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`error validating ${subject} on validation start`, [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError(`error validating ${subject}, async schemas are not supported`, []), null];
  }

  if (result.issues) {
    return [new ValidationError(`error validating ${subject}`, [...result.issues]), null];
  }

  return [null, result.value];
}
