/**
 * Middleware exports for vetted
 */

// Core middleware types and functions
export { compose, createContext } from '../middleware';
export type { HandlerContext, Middleware, Handler, ComposedMiddleware } from '../middleware';

// Built-in middleware
export { validate, validated } from './validate';
export type { ValidationErrorResponse } from './validate';
