import { SchemaDefinitionError } from '../types/Errors';
import { BaseValidator } from './BaseValidator';
import { isMapping } from './mapping';
import type { Cleaned, Schema } from './Schema';
import { required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

/**
 * A schema, or a function returning one for schemas that refer to
 * themselves or to a schema defined later
 */
export type SchemaSource<T extends object> = Schema<T> | (() => Schema<T>);

/**
 * Delegates to another schema. Its failures stay nested under this field.
 *
 * A lazy source is resolved once, on first use, and never again.
 */
export class NestedValidator<T extends object> extends BaseValidator<Cleaned<T>> {
  private resolved?: Schema<T>;
  private resolving = false;

  constructor(private readonly source: SchemaSource<T>) {
    super();
    if (typeof source !== 'function') {
      this.resolved = source;
    }
  }

  protected get typeName(): string {
    return this.resolved ? `nested<${this.resolved.name}>` : 'nested';
  }

  private schema(): Schema<T> {
    if (this.resolved) {
      return this.resolved;
    }
    if (this.resolving || typeof this.source !== 'function') {
      throw SchemaDefinitionError.circularReference('Lazy schema reference resolved to itself while resolving');
    }

    this.resolving = true;
    try {
      this.resolved = this.source();
      return this.resolved;
    } finally {
      this.resolving = false;
    }
  }

  validate(value: unknown): ValidationResult<Cleaned<T>> {
    if (value === undefined) {
      return required();
    }

    if (!isMapping(value)) {
      return typeError('a mapping');
    }

    return this.schema().safeValidate(value);
  }

  serialize(record: Cleaned<T>): Record<string, unknown> {
    return this.schema().serialize(record);
  }
}
