import type { Validator, ValidationResult, ValidatorMeta } from './Validator';

/**
 * Label and description shown by `Schema.describe()`
 */
export interface FieldInfo {
  label?: string;
  description?: string;
}

/**
 * Shared behaviour of the built-in validators.
 *
 * Validators are immutable: every chain method returns a new instance.
 */
export abstract class BaseValidator<T> implements Validator<T> {
  declare readonly _type?: T;

  /**
   * Name of the logical type, e.g. `int` or `list<string>`
   */
  protected abstract get typeName(): string;

  abstract validate(value: unknown): ValidationResult<T>;

  get meta(): ValidatorMeta {
    return { type: this.typeName };
  }

  serialize(value: T): unknown {
    return value;
  }

  /**
   * Attach a label and description without changing validation
   */
  describe(info: FieldInfo): Validator<T> {
    return new DescribedValidator(this, info);
  }
}

/**
 * Wraps a validator with documentation metadata
 */
export class DescribedValidator<T> extends BaseValidator<T> {
  constructor(
    private readonly inner: Validator<T>,
    private readonly info: FieldInfo
  ) {
    super();
  }

  protected get typeName(): string {
    return this.inner.meta.type;
  }

  get meta(): ValidatorMeta {
    return { ...this.inner.meta, ...this.info };
  }

  validate(value: unknown): ValidationResult<T> {
    return this.inner.validate(value);
  }

  serialize(value: T): unknown {
    return this.inner.serialize(value);
  }
}
