import * as v from 'valibot';
import { ValidationError } from '../lib/errors.js';

/**
 * Validate request input (query, path parameters) against a schema.
 * @throws ValidationError with the first issue's message
 */
export function validateInput<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    throw new ValidationError(result.issues[0]?.message || 'Validation failed');
  }
  return result.output;
}
