/**
 * Validator builder object
 *
 * Import and use `v` to create validators:
 *
 * @example
 * ```typescript
 * import { schema, v } from 'vetted';
 *
 * const profile = schema({
 *   name: v.string().min(2),
 *   email: v.string().email(),
 *   age: v.optional(v.int().min(0)),
 * });
 * ```
 */

import { BooleanValidator } from './BooleanValidator';
import { DateValidator } from './DateValidator';
import type { DateOptions } from './DateValidator';
import { EitherValidator } from './EitherValidator';
import type { Branches } from './EitherValidator';
import { enumOf } from './EnumValidator';
import { ListValidator } from './ListValidator';
import { mapOf } from './MapValidator';
import { NestedValidator } from './NestedValidator';
import type { SchemaSource } from './NestedValidator';
import { NumberValidator } from './NumberValidator';
import type { NumberOptions } from './NumberValidator';
import { DefaultValidator, OptionalValidator } from './OptionalValidator';
import type { OptionalOptions } from './OptionalValidator';
import { SetValidator } from './SetValidator';
import { StringValidator } from './StringValidator';
import type { StringOptions } from './StringValidator';
import type { EnumMember } from './EnumValidator';
import { TagValidator } from './TagValidator';
import { taggedOf } from './TaggedValidator';
import { TimeValidator } from './TimeValidator';
import type { TimeOptions } from './TimeValidator';
import type { SizeOptions } from './container';
import type { Validator, ValidationResult } from './Validator';

export const v = {
  /**
   * Create a string validator
   *
   * @example
   * ```typescript
   * v.string() // non-blank, trimmed string
   * v.string().min(2).max(100) // string with length constraints
   * v.string({ blank: true, multiline: true }) // free text
   * v.string().pattern(/^[a-z_]+$/) // must match the whole value
   * v.string().email() // email validation
   * ```
   */
  string: (options?: StringOptions) => new StringValidator(options),

  /**
   * Create an integer validator (accepts integer strings such as `"20"`)
   *
   * @example
   * ```typescript
   * v.int() // any integer
   * v.int().min(0).max(120) // integer with range constraints
   * ```
   */
  int: (options?: NumberOptions) => new NumberValidator('int', options),

  /**
   * Create a number validator (accepts decimal strings such as `"2.5"`)
   */
  float: (options?: NumberOptions) => new NumberValidator('float', options),

  /**
   * Create a boolean validator
   */
  boolean: () => new BooleanValidator(),

  /**
   * Create a date validator
   *
   * @example
   * ```typescript
   * v.date() // accepts Date, ISO 8601 text, millisecond timestamp
   * v.date().min('2024-01-01') // on or after 2024-01-01
   * v.date().strict() // only accept Date objects
   * ```
   */
  date: (options?: DateOptions) => new DateValidator(options),

  /**
   * Create a time-of-day validator
   *
   * @example
   * ```typescript
   * v.time() // '09:30', '09:30:15.250' or a Date's UTC time
   * v.time().min('09:00').lt('17:30')
   * ```
   */
  time: (options?: TimeOptions) => new TimeValidator(options),

  /**
   * Accept a missing value or `null` as `null`
   *
   * @example
   * ```typescript
   * v.optional(v.string()) // string | null
   * v.optional(v.string(), { omissible: false }) // null allowed, missing is not
   * ```
   */
  optional: <T>(validator: Validator<T>, options?: OptionalOptions) => new OptionalValidator(validator, options),

  /**
   * Use `fallback()` when the value is missing
   *
   * @example
   * ```typescript
   * v.withDefault(v.int(), () => 1)
   * v.withDefault(v.list(v.string()), () => [])
   * ```
   */
  withDefault: <T>(validator: Validator<T>, fallback: () => T) => new DefaultValidator(validator, fallback),

  /**
   * Accept the first branch that validates; the result records which branch matched
   *
   * @example
   * ```typescript
   * const idOrName = v.either({ id: v.int(), name: v.string() });
   * // { tag: 'id', value: number } | { tag: 'name', value: string }
   * ```
   */
  either: <B extends Branches>(branches: B) => new EitherValidator(branches),

  /**
   * Create a list validator
   *
   * @example
   * ```typescript
   * v.list(v.string()) // list of strings
   * v.list(v.int()).min(1).max(10) // list with size constraints
   * v.list(v.nested(address)) // list of records
   * ```
   */
  list: <T>(item: Validator<T>, options?: SizeOptions) => new ListValidator(item, options),

  /**
   * Create a set validator; duplicates collapse after cleaning
   */
  set: <T>(item: Validator<T>, options?: SizeOptions) => new SetValidator(item, options),

  /**
   * Create a map validator
   *
   * @example
   * ```typescript
   * v.map(v.int()) // ReadonlyMap<string, number>
   * v.map(v.string(), { key: v.int() }) // ReadonlyMap<number, string>
   * ```
   */
  map: mapOf,

  /**
   * Create an enum validator
   *
   * @example
   * ```typescript
   * v.enumOf(['draft', 'published'] as const)
   * v.enumOf(Role) // a TypeScript enum
   * ```
   */
  enumOf,

  /**
   * Declare the discriminating field of a schema used in `v.tagged()`
   */
  tag: <T extends readonly EnumMember[]>(...tags: T) => new TagValidator<T[number]>(tags),

  /**
   * Route a mapping to the schema whose tag matches its `tagField`
   *
   * @example
   * ```typescript
   * v.tagged('kind', circle, square)
   * ```
   */
  tagged: taggedOf,

  /**
   * Validate a mapping against another schema
   *
   * @example
   * ```typescript
   * v.nested(address)
   * v.nested(() => category) // resolved on first use, for self references
   * ```
   */
  nested: <T extends object>(source: SchemaSource<T>) => new NestedValidator(source),

  /**
   * Create a custom validator with user-defined validation logic
   *
   * @example
   * ```typescript
   * v.custom<string>('prefixed', (value) => {
   *   if (typeof value !== 'string' || !value.startsWith('PREFIX_')) {
   *     return { success: false, errors: [{ path: [], message: 'must start with PREFIX_', kind: 'pattern' }] };
   *   }
   *   return { success: true, data: value };
   * });
   * ```
   */
  custom: <T>(type: string, validateFn: (value: unknown) => ValidationResult<T>): Validator<T> => ({
    meta: { type },
    validate: validateFn,
    serialize: (value: T) => value,
  }),
};
