import { BaseValidator } from './BaseValidator';
import { checkSize, checkSizeOptions, validateElements, valueIdentity } from './container';
import { FrozenSet } from './frozen';
import type { SizeOptions } from './container';
import { ok, required, typeError } from './Validator';
import type { Validator, ValidationResult } from './Validator';

/**
 * Set validator: accepts an array or a Set, elements that clean to equal
 * values collapse into the first of them. Size constraints apply to the
 * cleaned set, which is read-only.
 */
export class SetValidator<T> extends BaseValidator<ReadonlySet<T>> {
  private readonly options: Readonly<SizeOptions>;

  constructor(
    private readonly item: Validator<T>,
    options: SizeOptions = {}
  ) {
    super();
    this.options = checkSizeOptions(options);
  }

  protected get typeName(): string {
    return `set<${this.item.meta.type}>`;
  }

  validate(value: unknown): ValidationResult<ReadonlySet<T>> {
    if (value === undefined) {
      return required();
    }

    if (!Array.isArray(value) && !(value instanceof Set)) {
      return typeError('a list or set');
    }

    const result = validateElements([...value], (element) => this.item.validate(element));
    if (!result.success) {
      return result;
    }

    const seen = new Set<unknown>();
    const unique = result.data.filter((element) => {
      const identity = valueIdentity(this.item, element);
      if (seen.has(identity)) {
        return false;
      }
      seen.add(identity);
      return true;
    });

    const cleaned: ReadonlySet<T> = new FrozenSet(unique);
    return checkSize(cleaned.size, this.options) ?? ok(cleaned);
  }

  serialize(values: ReadonlySet<T>): unknown[] {
    return [...values].map((value) => this.item.serialize(value));
  }
}
