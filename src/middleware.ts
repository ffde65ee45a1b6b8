import { SilentLogger } from './core';
import type { Logger } from './core';

/**
 * Context passed to middleware and handlers
 *
 * Carries the request payload, which a middleware may replace (for example
 * with a validated record), and a per-request metadata store.
 */
export interface HandlerContext<Req = unknown> {
  /** Operation name, used in log entries */
  name: string;

  /** Request payload */
  payload: Req;

  /** Per-request metadata store for middleware */
  meta: Record<string, unknown>;

  /** Logger instance */
  logger: Logger;
}

/**
 * Middleware function type
 *
 * Middleware may return a value to short-circuit the chain.
 * A non-undefined returned value is treated as the final response.
 */
export type Middleware<Req = unknown, Res = unknown> = (
  ctx: HandlerContext<Req>,
  next: () => Promise<Res | undefined>
) => Promise<Res | undefined> | Res | undefined;

/**
 * Handler function type
 *
 * Called after all middleware have executed. Its return value becomes the response.
 */
export type Handler<Req = unknown, Res = unknown> = (payload: Req, ctx: HandlerContext<Req>) => Promise<Res> | Res;

/**
 * Composed middleware chain - single function that executes all middleware
 */
export type ComposedMiddleware<Req = unknown, Res = unknown> = (ctx: HandlerContext<Req>) => Promise<Res | undefined>;

/**
 * Compose an array of middleware and a handler into a single function
 *
 * Follows Express/Koa-like semantics:
 * - Middleware are executed in order
 * - next() advances to the next middleware
 * - Returning a non-undefined value short-circuits the chain
 * - The handler is always executed last
 *
 * @example
 * ```typescript
 * const composed = compose([validate(signup)], (payload) => ({ created: payload }));
 * await composed(createContext('SIGNUP', body));
 * ```
 */
export const compose = <Req = unknown, Res = unknown>(
  middlewares: Middleware<Req, Res>[],
  handler: Handler<Req, Res>
): ComposedMiddleware<Req, Res> => {
  const handlerWrapper: Middleware<Req, Res> = async (ctx) => handler(ctx.payload, ctx);
  const chain = [...middlewares, handlerWrapper];

  return async (ctx: HandlerContext<Req>) => {
    let index = -1;

    const dispatch = async (i: number): Promise<Res | undefined> => {
      if (i <= index) {
        throw new Error('next() called multiple times');
      }
      index = i;

      const middleware = chain[i];
      if (!middleware) {
        return undefined;
      }

      return middleware(ctx, () => dispatch(i + 1));
    };

    return dispatch(0);
  };
};

/**
 * Create a HandlerContext object
 */
export const createContext = <Req = unknown>(
  name: string,
  payload: Req,
  logger: Logger = new SilentLogger(),
  meta: Record<string, unknown> = {}
): HandlerContext<Req> => ({
  name,
  payload,
  meta,
  logger,
});

// Re-export built-in middleware for convenience
export { validate, validated } from './middleware/validate';
export type { ValidationErrorResponse } from './middleware/validate';
