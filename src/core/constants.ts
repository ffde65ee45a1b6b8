/**
 * Centralized constants for vetted
 *
 * Failure kinds, default messages and validator defaults live here so that
 * every validator reports the same wording for the same problem.
 */

/**
 * Every tag a failure can carry
 */
export const FAILURE_KINDS = [
  'required',
  'type_error',
  'blank',
  'min_length',
  'max_length',
  'length',
  'pattern',
  'min',
  'max',
  'gt',
  'lt',
  'no_match',
  'invalid_choice',
  'duplicate_key',
] as const;

/**
 * String validator defaults
 */
export const STRING_DEFAULTS = {
  /**
   * Reject empty (or whitespace-only) strings
   */
  BLANK: false,

  /**
   * Trim surrounding whitespace before any check
   */
  STRIP: true,

  /**
   * Keep line breaks; when false they are replaced by a single space
   */
  MULTILINE: false,
} as const;

/**
 * Default schema options
 */
export const SCHEMA_DEFAULTS = {
  NAME: 'Schema',
} as const;

/**
 * Preset patterns available on the string validator
 */
export const PATTERNS = {
  EMAIL: /^[^\s@]+@[^\s@]+\.[^\s@]+$/,
  UUID: /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i,
} as const;

/**
 * ISO 8601 text accepted by the date and time validators
 */
export const ISO_PATTERNS = {
  /**
   * `YYYY-MM-DD`, optionally followed by `THH:MM[:SS[.fff]]` (or a space) and `Z` or `±HH:MM`
   */
  DATE: /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?)(Z|[+-]\d{2}:\d{2})?)?$/,

  /**
   * `HH:MM`, `HH:MM:SS` or `HH:MM:SS.fff`
   */
  TIME: /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/,
} as const;

/**
 * Default failure messages
 */
export const MESSAGES = {
  REQUIRED: 'this field is required',
  BLANK: 'this field can not be blank',
  INVALID_EMAIL: 'must be a valid email address',
  INVALID_UUID: 'must be a valid UUID',
  typeError: (expected: string): string => `expected ${expected}`,
  minLength: (length: number): string => `length must be ≥ ${length}`,
  maxLength: (length: number): string => `length must be ≤ ${length}`,
  length: (length: number): string => `length must be exactly ${length}`,
  pattern: (source: string): string => `must match pattern ${source}`,
  min: (bound: string | number): string => `must be ≥ ${bound}`,
  max: (bound: string | number): string => `must be ≤ ${bound}`,
  gt: (bound: string | number): string => `must be > ${bound}`,
  lt: (bound: string | number): string => `must be < ${bound}`,
  noMatch: (reasons: readonly string[]): string => `no variant matched (${reasons.join('; ')})`,
  invalidChoice: (members: readonly string[]): string => `must be one of: ${members.join(', ')}`,
  duplicateKey: (key: string): string => `duplicate key after cleaning: ${key}`,
} as const;
