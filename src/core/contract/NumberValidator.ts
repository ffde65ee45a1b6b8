import { MESSAGES } from '../constants';
import { BaseValidator } from './BaseValidator';
import { checkBoundOptions, checkBounds, checkChoices } from './bounds';
import type { Bounds } from './bounds';
import { fail, ok, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

export type NumberMode = 'int' | 'float';

/**
 * Number validator options
 */
export interface NumberOptions extends Bounds<number> {
  /**
   * Accepted values
   */
  oneOf?: readonly number[];
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Number validator with chainable methods
 *
 * `int` accepts integers and integer strings (`"20"` becomes 20); `float`
 * accepts finite numbers and decimal strings. Bounds are checked after the
 * conversion in the order min, gt, max, lt, and the choices last.
 */
export class NumberValidator extends BaseValidator<number> {
  private readonly options: Readonly<NumberOptions>;

  constructor(
    private readonly mode: NumberMode,
    options: NumberOptions = {}
  ) {
    super();
    checkBoundOptions(options, { ...options });
    checkChoices(options.oneOf);
    this.options = Object.freeze({ ...options });
  }

  protected get typeName(): string {
    return this.mode;
  }

  /**
   * Set minimum value (inclusive)
   */
  min(value: number): NumberValidator {
    return new NumberValidator(this.mode, { ...this.options, min: value });
  }

  /**
   * Set maximum value (inclusive)
   */
  max(value: number): NumberValidator {
    return new NumberValidator(this.mode, { ...this.options, max: value });
  }

  /**
   * Require a value strictly greater than the bound
   */
  gt(value: number): NumberValidator {
    return new NumberValidator(this.mode, { ...this.options, gt: value });
  }

  /**
   * Require a value strictly less than the bound
   */
  lt(value: number): NumberValidator {
    return new NumberValidator(this.mode, { ...this.options, lt: value });
  }

  oneOf(values: readonly number[]): NumberValidator {
    return new NumberValidator(this.mode, { ...this.options, oneOf: values });
  }

  private convert(value: unknown): number | undefined {
    if (typeof value === 'number') {
      if (this.mode === 'int') {
        return Number.isSafeInteger(value) ? value : undefined;
      }
      return Number.isFinite(value) ? value : undefined;
    }

    if (typeof value === 'string') {
      const text = value.trim();
      const parsed = Number(text);
      if (this.mode === 'int') {
        return INTEGER_TEXT.test(text) && Number.isSafeInteger(parsed) ? parsed : undefined;
      }
      return DECIMAL_TEXT.test(text) && Number.isFinite(parsed) ? parsed : undefined;
    }

    return undefined;
  }

  validate(value: unknown): ValidationResult<number> {
    if (value === undefined) {
      return required();
    }

    const converted = this.convert(value);
    if (converted === undefined) {
      return typeError(this.mode === 'int' ? 'an integer' : 'a number');
    }

    const boundFailure = checkBounds(converted, this.options, (bound) => bound);
    if (boundFailure) {
      return boundFailure;
    }

    const { oneOf } = this.options;
    if (oneOf !== undefined && !oneOf.includes(converted)) {
      return fail('invalid_choice', MESSAGES.invalidChoice(oneOf.map(String)));
    }

    return ok(converted);
  }
}
