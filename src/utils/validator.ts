import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a decoded value against a StandardSchemaV1 schema (zod, valibot, arktype, ...)
 * and wraps the result in a tuple-style `[error, value]` response.
 *
 * - Sync and async schemas are both supported.
 * - A throwing schema yields a `ValidationError` without issues, with the thrown error as `cause`.
 * - A result with `issues` yields a `ValidationError` carrying those issues.
 */
export async function validator<Schema extends StandardSchemaV1>(
  input: unknown,
  schema: Schema,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Schema>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<Schema>>;

  const [errStart, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
