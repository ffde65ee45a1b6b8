import { BaseValidator } from './BaseValidator';
import { ok, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

const TRUE_TEXT = new Set(['true', '1']);
const FALSE_TEXT = new Set(['false', '0']);

/**
 * Boolean validator
 *
 * Accepts booleans, the numbers 0 and 1, and the strings
 * `true`/`false`/`1`/`0` in any case.
 */
export class BooleanValidator extends BaseValidator<boolean> {
  protected get typeName(): string {
    return 'boolean';
  }

  validate(value: unknown): ValidationResult<boolean> {
    if (value === undefined) {
      return required();
    }

    if (typeof value === 'boolean') {
      return ok(value);
    }

    if (value === 1 || value === 0) {
      return ok(value === 1);
    }

    if (typeof value === 'string') {
      const text = value.trim().toLowerCase();
      if (TRUE_TEXT.has(text)) return ok(true);
      if (FALSE_TEXT.has(text)) return ok(false);
    }

    return typeError('a boolean');
  }
}
