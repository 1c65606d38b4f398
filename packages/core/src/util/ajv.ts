import AjvModule, { type AnySchema, type ValidateFunction } from 'ajv';

import { ParseError } from '../types/errors.js';

// ajv ships CommonJS; its class sits on `.default` when loaded from ESM.
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, strict: true });

/**
 * Compile a validator that narrows `unknown` input to `T` and throws a
 * ParseError describing every violation otherwise.
 */
export function createInputValidator<T>(
  schema: AnySchema,
  label: string
): (input: unknown) => T {
  const validate: ValidateFunction<T> = ajv.compile<T>(schema);
  return (input) => {
    if (validate(input)) {
      return input;
    }
    const summary = ajv.errorsText(validate.errors, { dataVar: label });
    throw new ParseError({
      message: `Invalid ${label}: ${summary}`,
      context: { input: label, value: validate.errors ?? [] },
    });
  };
}
