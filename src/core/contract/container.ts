import { MESSAGES } from '../constants';
import { SchemaDefinitionError } from '../types/Errors';
import type { Issue, ValidationResult, ValidationFailure, Validator } from './Validator';
import { fail, indexSegment, ok, prefixIssues } from './Validator';

/**
 * Size constraints shared by lists, sets and maps
 */
export interface SizeOptions {
  minLength?: number;
  maxLength?: number;
  length?: number;
}

const SIZE_KEYS = ['minLength', 'maxLength', 'length'] as const;

export const checkSizeOptions = (options: SizeOptions): Readonly<SizeOptions> => {
  for (const name of SIZE_KEYS) {
    const value = options[name];
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw SchemaDefinitionError.invalidConfig(`${name} must be a non-negative integer`, { [name]: value });
    }
  }
  if (options.minLength !== undefined && options.maxLength !== undefined && options.minLength > options.maxLength) {
    throw SchemaDefinitionError.invalidConfig('minLength must not exceed maxLength', { ...options });
  }
  return Object.freeze({ ...options });
};

/**
 * First size violation, if any, in the order min, max, exact
 */
export const checkSize = (size: number, options: Readonly<SizeOptions>): ValidationFailure | undefined => {
  if (options.minLength !== undefined && size < options.minLength) {
    return fail('min_length', MESSAGES.minLength(options.minLength));
  }
  if (options.maxLength !== undefined && size > options.maxLength) {
    return fail('max_length', MESSAGES.maxLength(options.maxLength));
  }
  if (options.length !== undefined && size !== options.length) {
    return fail('length', MESSAGES.length(options.length));
  }
  return undefined;
};

/**
 * Run one validator over every element, collecting every element failure
 * under its index instead of stopping at the first.
 */
export const validateElements = <T>(
  values: readonly unknown[],
  validate: (value: unknown) => ValidationResult<T>
): ValidationResult<T[]> => {
  const result: T[] = [];
  const errors: Issue[] = [];

  // Holes in a sparse array read as undefined and fail as absent elements.
  for (let index = 0; index < values.length; index++) {
    const itemResult = validate(values[index]);
    if (itemResult.success) {
      result.push(itemResult.data);
    } else {
      errors.push(...prefixIssues(indexSegment(index), itemResult.errors));
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return ok(result);
};

/**
 * Value under which a cleaned element is compared with its siblings.
 * Two cleaned values are the same when they serialize to the same plain value,
 * so two equal dates collapse even though they are distinct objects.
 */
export const valueIdentity = <T>(validator: Validator<T>, value: T): unknown => {
  const plain = validator.serialize(value);
  return typeof plain === 'object' && plain !== null ? JSON.stringify(plain) : plain;
};
