import { MESSAGES } from '../constants';
import { SchemaDefinitionError } from '../types/Errors';
import { fail } from './Validator';
import type { ValidationFailure } from './Validator';

/**
 * Range constraints for comparable values: `min`/`max` are inclusive,
 * `gt`/`lt` exclusive
 */
export interface Bounds<B> {
  min?: B;
  max?: B;
  gt?: B;
  lt?: B;
}

const BOUND_KEYS = ['min', 'max', 'gt', 'lt'] as const;

/**
 * Map every bound through `convert`, keeping absent bounds absent
 */
export const mapBounds = <B, R>(bounds: Bounds<B>, convert: (bound: B) => R): Bounds<R> => {
  const mapped: Bounds<R> = {};
  for (const name of BOUND_KEYS) {
    const bound = bounds[name];
    if (bound !== undefined) {
      mapped[name] = convert(bound);
    }
  }
  return mapped;
};

/**
 * Reject bounds that leave no value acceptable
 */
export const checkBoundOptions = (bounds: Readonly<Bounds<number>>, details: Record<string, unknown>): void => {
  for (const name of BOUND_KEYS) {
    const bound = bounds[name];
    if (bound !== undefined && Number.isNaN(bound)) {
      throw SchemaDefinitionError.invalidConfig(`${name} must be a valid bound`, details);
    }
  }

  const { min, max, gt, lt } = bounds;
  const empty =
    (min !== undefined && max !== undefined && min > max) ||
    (min !== undefined && lt !== undefined && min >= lt) ||
    (gt !== undefined && max !== undefined && gt >= max) ||
    (gt !== undefined && lt !== undefined && gt >= lt);
  if (empty) {
    throw SchemaDefinitionError.invalidConfig('lower bound must be below upper bound', details);
  }
};

/**
 * First bound violation, if any, in the order min, gt, max, lt
 */
export const checkBounds = (
  value: number,
  bounds: Readonly<Bounds<number>>,
  show: (bound: number) => string | number
): ValidationFailure | undefined => {
  if (bounds.min !== undefined && value < bounds.min) {
    return fail('min', MESSAGES.min(show(bounds.min)));
  }
  if (bounds.gt !== undefined && value <= bounds.gt) {
    return fail('gt', MESSAGES.gt(show(bounds.gt)));
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return fail('max', MESSAGES.max(show(bounds.max)));
  }
  if (bounds.lt !== undefined && value >= bounds.lt) {
    return fail('lt', MESSAGES.lt(show(bounds.lt)));
  }
  return undefined;
};

export const checkChoices = (choices: readonly unknown[] | undefined): void => {
  if (choices !== undefined && choices.length === 0) {
    throw SchemaDefinitionError.invalidConfig('oneOf needs at least one value');
  }
};
