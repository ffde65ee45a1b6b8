import type { Cleaned, FlatIssue, Schema, ValidationResult } from '../core';
import { ValidationError, withContext } from '../core';
import type { Handler, HandlerContext, Middleware } from '../middleware';

/**
 * Validation error response format
 */
export interface ValidationErrorResponse {
  error: 'ValidationError';
  schema: string;
  details: FlatIssue[];
}

/**
 * Check the context payload, logging the outcome
 * @internal
 */
const check = <T extends object>(schema: Schema<T>, ctx: HandlerContext<unknown>): ValidationResult<Cleaned<T>> => {
  const logger = withContext(ctx.logger, { operation: ctx.name });
  try {
    const result = schema.safeValidate(ctx.payload);

    if (!result.success) {
      logger.debug('Payload validation failed', { schema: schema.name, failures: result.errors.length });
      return result;
    }

    logger.debug('Payload validation passed', { schema: schema.name });
    return result;
  } catch (error) {
    logger.error('Validation middleware error', error instanceof Error ? error : undefined);
    throw error;
  }
};

const toResponse = (schemaName: string, error: ValidationError): ValidationErrorResponse => ({
  error: 'ValidationError',
  schema: schemaName,
  details: error.flatten(),
});

/**
 * Built-in validate middleware
 *
 * Validates the incoming payload against a schema.
 *
 * If validation fails, returns a standardized error response and short-circuits the chain.
 * If validation passes, replaces ctx.payload with the cleaned record.
 * A payload that is not a mapping is a caller bug: the ContractError is logged and rethrown.
 *
 * @example
 * ```typescript
 * const run = compose([validate(signup)], (payload) => ({ created: payload }));
 * await run(createContext('SIGNUP', body));
 * ```
 */
export const validate = <T extends object, Res = unknown>(
  schema: Schema<T>
): Middleware<unknown, Res | ValidationErrorResponse> => {
  return async (ctx, next) => {
    const result = check(schema, ctx);

    if (!result.success) {
      return toResponse(schema.name, new ValidationError(result.errors, schema.name));
    }

    ctx.payload = result.data;
    return next();
  };
};

/**
 * Wrap a handler so it receives the cleaned record with its schema type
 *
 * @example
 * ```typescript
 * const run = compose([], validated(signup, (user) => ({ welcome: user.username })));
 * ```
 */
export const validated = <T extends object, Res>(
  schema: Schema<T>,
  handler: Handler<Cleaned<T>, Res>
): Handler<unknown, Res | ValidationErrorResponse> => {
  return async (_payload, ctx) => {
    const result = check(schema, ctx);

    if (!result.success) {
      return toResponse(schema.name, new ValidationError(result.errors, schema.name));
    }

    return handler(result.data, { ...ctx, payload: result.data });
  };
};
