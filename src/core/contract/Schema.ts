import { SCHEMA_DEFAULTS } from '../constants';
import { ContractError, SchemaDefinitionError, ValidationError } from '../types/Errors';
import { SilentLogger, withContext } from '../types/Logger';
import type { Logger } from '../types/Logger';
import { isMapping, readField } from './mapping';
import { fieldSegment, ok, prefixIssues } from './Validator';
import type { Infer, Issue, Validator, ValidationResult, ValidatorMeta } from './Validator';

/**
 * Field name to validator bindings, in declaration order
 */
export type Fields = Record<string, Validator<unknown>>;

/**
 * Record type produced by a set of fields
 */
export type Shape<F extends Fields> = { readonly [K in keyof F]: Infer<F[K]> };

/**
 * Immutable record returned by a successful validation
 */
export type Cleaned<T> = Readonly<T>;

/**
 * Helper type to infer the cleaned record type from a Schema
 */
export type InferSchema<S> = S extends Schema<infer T> ? Cleaned<T> : never;

/**
 * Schema configuration options
 */
export interface SchemaOptions {
  /**
   * Name used in error messages and log entries (default `Schema`)
   */
  name?: string;
  logger?: Logger;
}

export interface FieldSpec {
  readonly name: string;
  readonly validator: Validator<unknown>;
  readonly index: number;
}

export interface FieldDescription extends ValidatorMeta {
  readonly name: string;
  readonly index: number;
}

const appendField = (specs: readonly FieldSpec[], name: string, validator: Validator<unknown>): readonly FieldSpec[] => {
  if (specs.some((spec) => spec.name === name)) {
    throw SchemaDefinitionError.duplicateField(`Field "${name}" is already defined`, { field: name });
  }
  return Object.freeze([...specs, Object.freeze({ name, validator, index: specs.length })]);
};

const describeInput = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

/**
 * An ordered, immutable set of named fields.
 *
 * `validate` checks every field, never stopping at the first bad one, and
 * either returns a frozen record or throws one ValidationError carrying every
 * failure.
 *
 * @example
 * ```typescript
 * import { schema, v } from 'vetted';
 *
 * const signup = schema(
 *   {
 *     username: v.string().min(3).pattern(/^[a-zA-Z_]+$/),
 *     password: v.string().min(8),
 *     age: v.int(),
 *   },
 *   { name: 'Signup' }
 * );
 *
 * const user = signup.validate({ username: 'user', password: 'KJF83h9q3FAS', age: '20' });
 * user.age; // 20
 * ```
 */
export class Schema<T extends object> {
  readonly name: string;
  private readonly logger: Logger;
  private readonly fields: readonly FieldSpec[];
  private readonly options: SchemaOptions;

  /**
   * @internal Use `schema()` or `Schema.builder()`
   */
  constructor(fields: readonly FieldSpec[], options: SchemaOptions = {}) {
    this.options = Object.freeze({ ...options });
    this.name = options.name ?? SCHEMA_DEFAULTS.NAME;
    this.logger = withContext(options.logger || new SilentLogger(), { schema: this.name });
    this.fields = fields;
    Object.freeze(this);
  }

  /**
   * Start an empty schema and register fields one at a time
   */
  static builder(options?: SchemaOptions): SchemaBuilder<Record<never, never>> {
    return new SchemaBuilder<Record<never, never>>(options);
  }

  get fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  /**
   * Validator bound to a field, if the schema declares it
   */
  fieldValidator(name: string): Validator<unknown> | undefined {
    return this.fields.find((field) => field.name === name)?.validator;
  }

  /**
   * Validate without throwing on invalid data
   */
  safeValidate(raw: unknown): ValidationResult<Cleaned<T>> {
    if (!isMapping(raw)) {
      throw ContractError.notAMapping(`${this.name} expects a mapping, received ${describeInput(raw)}`, {
        schema: this.name,
        received: describeInput(raw),
      });
    }

    const values: Array<[string, unknown]> = [];
    const errors: Issue[] = [];

    for (const field of this.fields) {
      const result = field.validator.validate(readField(raw, field.name));
      if (result.success) {
        values.push([field.name, result.data]);
      } else {
        errors.push(...prefixIssues(fieldSegment(field.name), result.errors));
      }
    }

    if (errors.length > 0) {
      this.logger.debug('Schema validation failed', { failures: errors.length });
      return { success: false, errors };
    }

    this.logger.debug('Schema validation passed');
    // every declared field has a value of its validator's type at this point
    return ok(Object.freeze(Object.fromEntries(values)) as Cleaned<T>);
  }

  /**
   * Validate a raw mapping, throwing a ValidationError that lists every failure
   */
  validate(raw: unknown): Cleaned<T> {
    const result = this.safeValidate(raw);
    if (!result.success) {
      throw new ValidationError(result.errors, this.name);
    }
    return result.data;
  }

  /**
   * Plain form of a record that validates back to an equal record
   */
  serialize(record: Cleaned<T>): Record<string, unknown> {
    const values = new Map<string, unknown>(Object.entries(record));
    return Object.fromEntries(
      this.fields.map((field) => [field.name, field.validator.serialize(values.get(field.name))])
    );
  }

  /**
   * Field documentation in declaration order
   */
  describe(): FieldDescription[] {
    return this.fields.map((field) => ({ name: field.name, index: field.index, ...field.validator.meta }));
  }

  /**
   * New schema with this schema's fields followed by `fields`.
   * Redefining an inherited field is an error.
   */
  extend<F extends Fields>(fields: F, options?: SchemaOptions): Schema<T & Shape<F>> {
    let specs = this.fields;
    for (const [name, validator] of Object.entries(fields)) {
      specs = appendField(specs, name, validator);
    }
    return new Schema<T & Shape<F>>(specs, { ...this.options, ...options });
  }
}

/**
 * Registers fields one by one; each call returns a new builder
 */
export class SchemaBuilder<T extends object> {
  constructor(
    private readonly options: SchemaOptions = {},
    private readonly specs: readonly FieldSpec[] = []
  ) {}

  field<N extends string, V extends Validator<unknown>>(
    name: N,
    validator: V
  ): SchemaBuilder<T & { readonly [K in N]: Infer<V> }> {
    return new SchemaBuilder<T & { readonly [K in N]: Infer<V> }>(
      this.options,
      appendField(this.specs, name, validator)
    );
  }

  build(): Schema<T> {
    return new Schema<T>(this.specs, this.options);
  }
}

/**
 * Define a schema from an object of fields (declaration order is kept)
 */
export const schema = <F extends Fields>(fields: F, options?: SchemaOptions): Schema<Shape<F>> => {
  let specs: readonly FieldSpec[] = [];
  for (const [name, validator] of Object.entries(fields)) {
    specs = appendField(specs, name, validator);
  }
  return new Schema<Shape<F>>(specs, options);
};
