import { BaseValidator } from './BaseValidator';
import { ok, required } from './Validator';
import type { Validator, ValidationResult } from './Validator';

export interface OptionalOptions {
  /**
   * When false, a missing value is still reported as required; only an
   * explicit `null` is accepted (default true)
   */
  omissible?: boolean;
}

/**
 * Accepts a missing or null value as `null`, otherwise defers to the wrapped validator
 */
export class OptionalValidator<T> extends BaseValidator<T | null> {
  private readonly omissible: boolean;

  constructor(
    private readonly inner: Validator<T>,
    options: OptionalOptions = {}
  ) {
    super();
    this.omissible = options.omissible ?? true;
  }

  protected get typeName(): string {
    return `optional<${this.inner.meta.type}>`;
  }

  validate(value: unknown): ValidationResult<T | null> {
    if (value === undefined) {
      return this.omissible ? ok(null) : required();
    }
    if (value === null) {
      return ok(null);
    }
    return this.inner.validate(value);
  }

  serialize(value: T | null): unknown {
    return value === null ? null : this.inner.serialize(value);
  }
}

/**
 * Supplies a value when the field is missing, otherwise defers to the wrapped validator.
 *
 * The factory runs once per validation so mutable defaults are never shared.
 */
export class DefaultValidator<T> extends BaseValidator<T> {
  constructor(
    private readonly inner: Validator<T>,
    private readonly fallback: () => T
  ) {
    super();
  }

  protected get typeName(): string {
    return this.inner.meta.type;
  }

  validate(value: unknown): ValidationResult<T> {
    if (value === undefined) {
      return ok(this.fallback());
    }
    return this.inner.validate(value);
  }

  serialize(value: T): unknown {
    return this.inner.serialize(value);
  }
}
