import { MESSAGES, PATTERNS, STRING_DEFAULTS } from '../constants';
import { BaseValidator } from './BaseValidator';
import { checkSize, checkSizeOptions } from './container';
import { checkChoices } from './bounds';
import type { SizeOptions } from './container';
import { fail, ok, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

/**
 * String validator options
 */
export interface StringOptions extends SizeOptions {
  /**
   * Accept empty or whitespace-only strings (default false)
   */
  blank?: boolean;
  /**
   * Trim surrounding whitespace (default true)
   */
  strip?: boolean;
  /**
   * Keep line breaks instead of replacing them with a space (default false)
   */
  multiline?: boolean;
  /**
   * Must match the whole value
   */
  pattern?: RegExp | string;
  patternMessage?: string;
  /**
   * Accepted values, compared after normalisation
   */
  oneOf?: readonly string[];
}

const LINE_BREAK = /\r\n|\r|\n/g;
const BLANK = /^\s*$/;

// Patterns run in unicode mode so `.` and quantifiers see whole code points.
const anchor = (pattern: RegExp | string): RegExp => {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  const unicode = /[uv]/.test(flags) ? flags : `${flags}u`;
  return new RegExp(`^(?:${source})$`, unicode);
};

/**
 * String validator with chainable methods
 *
 * Checks run in a fixed order and only the first failure is reported:
 * type, blank, min length, max length, exact length, pattern, choices.
 * Lengths count code points, so an emoji is one character.
 */
export class StringValidator extends BaseValidator<string> {
  private readonly options: Readonly<StringOptions>;
  private readonly regex?: RegExp;

  constructor(options: StringOptions = {}) {
    super();
    checkSizeOptions(options);
    checkChoices(options.oneOf);
    this.options = Object.freeze({ ...options });
    this.regex = options.pattern === undefined ? undefined : anchor(options.pattern);
  }

  protected get typeName(): string {
    return 'string';
  }

  private with(options: StringOptions): StringValidator {
    return new StringValidator({ ...this.options, ...options });
  }

  /**
   * Set minimum length
   */
  min(length: number): StringValidator {
    return this.with({ minLength: length });
  }

  /**
   * Set maximum length
   */
  max(length: number): StringValidator {
    return this.with({ maxLength: length });
  }

  /**
   * Require an exact length
   */
  length(length: number): StringValidator {
    return this.with({ length });
  }

  /**
   * Allow (or forbid) blank strings
   */
  blank(allowed: boolean = true): StringValidator {
    return this.with({ blank: allowed });
  }

  strip(enabled: boolean = true): StringValidator {
    return this.with({ strip: enabled });
  }

  multiline(enabled: boolean = true): StringValidator {
    return this.with({ multiline: enabled });
  }

  /**
   * Custom pattern validation
   */
  pattern(pattern: RegExp | string, message?: string): StringValidator {
    return this.with({ pattern, patternMessage: message });
  }

  /**
   * Accept only the listed values
   */
  oneOf(values: readonly string[]): StringValidator {
    return this.with({ oneOf: values });
  }

  /**
   * Validate as email format
   */
  email(): StringValidator {
    return this.pattern(PATTERNS.EMAIL, MESSAGES.INVALID_EMAIL);
  }

  /**
   * Validate as UUID format
   */
  uuid(): StringValidator {
    return this.pattern(PATTERNS.UUID, MESSAGES.INVALID_UUID);
  }

  private normalize(value: string): string {
    const strip = this.options.strip ?? STRING_DEFAULTS.STRIP;
    const multiline = this.options.multiline ?? STRING_DEFAULTS.MULTILINE;
    const stripped = strip ? value.trim() : value;
    return multiline ? stripped : stripped.replace(LINE_BREAK, ' ');
  }

  validate(value: unknown): ValidationResult<string> {
    if (value === undefined) {
      return required();
    }

    if (typeof value !== 'string') {
      return typeError('a string');
    }

    const text = this.normalize(value);
    const { pattern, patternMessage, oneOf } = this.options;

    if (BLANK.test(text)) {
      if (this.options.blank ?? STRING_DEFAULTS.BLANK) {
        // a permitted blank skips every other check
        return ok(text);
      }
      return fail('blank', MESSAGES.BLANK);
    }

    const sizeFailure = checkSize([...text].length, this.options);
    if (sizeFailure) {
      return sizeFailure;
    }

    if (this.regex && pattern !== undefined && !this.regex.test(text)) {
      const source = typeof pattern === 'string' ? pattern : pattern.source;
      return fail('pattern', patternMessage ?? MESSAGES.pattern(source));
    }

    if (oneOf !== undefined && !oneOf.includes(text)) {
      return fail('invalid_choice', MESSAGES.invalidChoice(oneOf));
    }

    return ok(text);
  }
}
