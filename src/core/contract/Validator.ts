import { FAILURE_KINDS, MESSAGES } from '../constants';

/**
 * Tag describing why a value was rejected
 */
export type FailureKind = (typeof FAILURE_KINDS)[number];

/**
 * One step into a value: a schema field, a list position, a mapping key, or
 * the position of a mapping entry whose key failed to validate
 */
export type PathSegment =
  | { readonly type: 'field'; readonly name: string }
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'entry'; readonly index: number };

/**
 * A single failure, located relative to the validator that produced it
 */
export interface Issue {
  readonly path: readonly PathSegment[];
  readonly message: string;
  readonly kind: FailureKind;
}

export interface ValidationSuccess<T> {
  readonly success: true;
  readonly data: T;
}

export interface ValidationFailure {
  readonly success: false;
  readonly errors: readonly Issue[];
}

/**
 * Validation result returned by validators
 */
export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

/**
 * Documentation attached to a validator
 */
export interface ValidatorMeta {
  readonly type: string;
  readonly label?: string;
  readonly description?: string;
}

/**
 * Base validator interface
 */
export interface Validator<T> {
  /**
   * Phantom type for TypeScript inference
   */
  readonly _type?: T;

  readonly meta: ValidatorMeta;

  /**
   * Validate a value and return result. `undefined` means the value is absent.
   */
  validate(value: unknown): ValidationResult<T>;

  /**
   * Turn a cleaned value back into a plain value this validator accepts
   */
  serialize(value: T): unknown;
}

/**
 * Helper type to infer the type from a Validator
 */
export type Infer<V> = V extends Validator<infer U> ? U : never;

export const ok = <T>(data: T): ValidationSuccess<T> => ({ success: true, data });

export const fail = (kind: FailureKind, message: string): ValidationFailure => ({
  success: false,
  errors: [{ path: [], message, kind }],
});

export const required = (): ValidationFailure => fail('required', MESSAGES.REQUIRED);

export const typeError = (expected: string): ValidationFailure =>
  fail('type_error', MESSAGES.typeError(expected));

/**
 * Prepend a segment to the path of every issue
 */
export const prefixIssues = (segment: PathSegment, issues: readonly Issue[]): Issue[] =>
  issues.map((issue) => ({ ...issue, path: [segment, ...issue.path] }));

export const fieldSegment = (name: string): PathSegment => ({ type: 'field', name });
export const indexSegment = (index: number): PathSegment => ({ type: 'index', index });
export const keySegment = (key: string): PathSegment => ({ type: 'key', key });
export const entrySegment = (index: number): PathSegment => ({ type: 'entry', index });

/**
 * Key under which a segment is addressed in an error report
 */
export const segmentKey = (segment: PathSegment): string => {
  switch (segment.type) {
    case 'field':
      return segment.name;
    case 'index':
      return String(segment.index);
    case 'key':
      return segment.key;
    case 'entry':
      return `#${segment.index}`;
  }
};

/**
 * Render a path the way it is written in code: `items[0].name`, `scores[en]`,
 * `scores[#1]` for the second entry of a mapping whose key was rejected
 */
export const formatPath = (path: readonly PathSegment[]): string =>
  path.reduce((out, segment) => {
    if (segment.type === 'field') {
      return out === '' ? segment.name : `${out}.${segment.name}`;
    }
    return `${out}[${segmentKey(segment)}]`;
  }, '');

/**
 * One line per issue, used when a failure has to be summarised in a message
 */
export const summarizeIssues = (issues: readonly Issue[]): string =>
  issues
    .map((issue) => (issue.path.length > 0 ? `${formatPath(issue.path)}: ${issue.message}` : issue.message))
    .join(', ');
