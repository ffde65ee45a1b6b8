import { BaseValidator } from './BaseValidator';
import { checkSize, checkSizeOptions, validateElements } from './container';
import type { SizeOptions } from './container';
import { ok, required, typeError } from './Validator';
import type { Validator, ValidationResult } from './Validator';

/**
 * List validator: every element is checked by the same item validator
 *
 * Element failures are all reported, each under its index (`tags[2]`).
 * Size constraints are checked before the elements.
 */
export class ListValidator<T> extends BaseValidator<readonly T[]> {
  private readonly options: Readonly<SizeOptions>;

  constructor(
    private readonly item: Validator<T>,
    options: SizeOptions = {}
  ) {
    super();
    this.options = checkSizeOptions(options);
  }

  protected get typeName(): string {
    return `list<${this.item.meta.type}>`;
  }

  /**
   * Set minimum list length
   */
  min(length: number): ListValidator<T> {
    return new ListValidator(this.item, { ...this.options, minLength: length });
  }

  /**
   * Set maximum list length
   */
  max(length: number): ListValidator<T> {
    return new ListValidator(this.item, { ...this.options, maxLength: length });
  }

  length(length: number): ListValidator<T> {
    return new ListValidator(this.item, { ...this.options, length });
  }

  validate(value: unknown): ValidationResult<readonly T[]> {
    if (value === undefined) {
      return required();
    }

    if (!Array.isArray(value)) {
      return typeError('a list');
    }

    const sizeFailure = checkSize(value.length, this.options);
    if (sizeFailure) {
      return sizeFailure;
    }

    const result = validateElements(value, (element) => this.item.validate(element));
    return result.success ? ok(Object.freeze(result.data)) : result;
  }

  serialize(values: readonly T[]): unknown[] {
    return values.map((value) => this.item.serialize(value));
  }
}
