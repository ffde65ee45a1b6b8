import { ISO_PATTERNS } from '../constants';
import { BaseValidator } from './BaseValidator';
import { checkBoundOptions, checkBounds, mapBounds } from './bounds';
import type { Bounds } from './bounds';
import { ok, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

export type DateInput = Date | string | number;

export interface DateOptions extends Bounds<DateInput> {
  /**
   * Only accept Date objects, not strings or timestamps
   */
  strict?: boolean;
}

/**
 * Parse ISO 8601 date text. Text without an offset is read as UTC;
 * anything else, including impossible calendar dates, is rejected.
 */
export const parseIsoDate = (text: string): Date | undefined => {
  const match = ISO_PATTERNS.DATE.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, day, time = '00:00', offset = 'Z'] = match;

  const [year, month, date] = day.split('-').map(Number);
  const calendar = new Date(Date.UTC(2000, month - 1, date));
  calendar.setUTCFullYear(year);
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== date) {
    return undefined;
  }

  const [hours, minutes, seconds = 0] = time.split(':').map(Number);
  if (hours > 23 || minutes > 59 || seconds >= 60) {
    return undefined;
  }

  const parsed = new Date(`${day}T${time}${offset}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

const toDate = (input: DateInput): Date | undefined => {
  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? undefined : new Date(input.getTime());
  }
  if (typeof input === 'number') {
    const date = new Date(input);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return parseIsoDate(input);
};

const boundTime = (input: DateInput): number => toDate(input)?.getTime() ?? Number.NaN;

/**
 * Date validator - validates Date objects, ISO 8601 date strings or millisecond timestamps
 */
export class DateValidator extends BaseValidator<Date> {
  private readonly bounds: Readonly<Bounds<number>>;
  private readonly acceptText: boolean;

  constructor(private readonly options: Readonly<DateOptions> = {}) {
    super();
    this.bounds = mapBounds(options, boundTime);
    this.acceptText = !options.strict;
    checkBoundOptions(this.bounds, { min: options.min, max: options.max, gt: options.gt, lt: options.lt });
  }

  protected get typeName(): string {
    return 'date';
  }

  /**
   * Set minimum date (inclusive)
   */
  min(date: DateInput): DateValidator {
    return new DateValidator({ ...this.options, min: date });
  }

  /**
   * Set maximum date (inclusive)
   */
  max(date: DateInput): DateValidator {
    return new DateValidator({ ...this.options, max: date });
  }

  /**
   * Require a date strictly after the bound
   */
  gt(date: DateInput): DateValidator {
    return new DateValidator({ ...this.options, gt: date });
  }

  /**
   * Require a date strictly before the bound
   */
  lt(date: DateInput): DateValidator {
    return new DateValidator({ ...this.options, lt: date });
  }

  /**
   * Only accept Date objects, not strings or timestamps
   */
  strict(): DateValidator {
    return new DateValidator({ ...this.options, strict: true });
  }

  private convert(value: unknown): Date | undefined {
    if (value instanceof Date) {
      return toDate(value);
    }
    if (this.acceptText && (typeof value === 'string' || typeof value === 'number')) {
      return toDate(value);
    }
    return undefined;
  }

  validate(value: unknown): ValidationResult<Date> {
    if (value === undefined) {
      return required();
    }

    const date = this.convert(value);
    if (!date) {
      return typeError(this.acceptText ? 'an ISO 8601 date string, Date or timestamp' : 'a Date object');
    }

    return checkBounds(date.getTime(), this.bounds, (bound) => new Date(bound).toISOString()) ?? ok(date);
  }

  serialize(value: Date): string {
    return value.toISOString();
  }
}
