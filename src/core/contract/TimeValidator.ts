import { ISO_PATTERNS } from '../constants';
import { BaseValidator } from './BaseValidator';
import { checkBoundOptions, checkBounds, mapBounds } from './bounds';
import type { Bounds } from './bounds';
import { ok, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

/**
 * Time of day without a date or zone
 */
export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

export type TimeInput = Date | string;

export type TimeOptions = Bounds<TimeInput>;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const toMillis = (time: TimeOfDay): number =>
  time.hour * MS_PER_HOUR + time.minute * MS_PER_MINUTE + time.second * MS_PER_SECOND + time.millisecond;

const fromMillis = (millis: number): TimeOfDay =>
  Object.freeze({
    hour: Math.floor(millis / MS_PER_HOUR),
    minute: Math.floor(millis / MS_PER_MINUTE) % 60,
    second: Math.floor(millis / MS_PER_SECOND) % 60,
    millisecond: millis % MS_PER_SECOND,
  });

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * `HH:MM:SS`, with `.mmm` when there are milliseconds
 */
export const formatTime = (time: TimeOfDay): string => {
  const base = `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
  return time.millisecond > 0 ? `${base}.${pad(time.millisecond, 3)}` : base;
};

/**
 * Parse `HH:MM`, `HH:MM:SS` or `HH:MM:SS.fff`
 */
export const parseTime = (text: string): TimeOfDay | undefined => {
  const match = ISO_PATTERNS.TIME.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, hour, minute, second = '0', fraction = '0'] = match;
  const time = {
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: Number(fraction.padEnd(3, '0')),
  };
  if (time.hour > 23 || time.minute > 59 || time.second > 59) {
    return undefined;
  }
  return Object.freeze(time);
};

const toTime = (input: TimeInput): TimeOfDay | undefined => {
  if (input instanceof Date) {
    const millis = input.getTime();
    return Number.isNaN(millis) ? undefined : fromMillis(((millis % 86_400_000) + 86_400_000) % 86_400_000);
  }
  return parseTime(input);
};

const boundMillis = (input: TimeInput): number => {
  const time = toTime(input);
  return time ? toMillis(time) : Number.NaN;
};

/**
 * Time validator - accepts ISO 8601 time text or a Date, whose UTC time of day is kept
 *
 * @example
 * ```typescript
 * v.time().min('09:00').lt('17:30') // opening hours
 * ```
 */
export class TimeValidator extends BaseValidator<TimeOfDay> {
  private readonly bounds: Readonly<Bounds<number>>;

  constructor(private readonly options: Readonly<TimeOptions> = {}) {
    super();
    this.bounds = mapBounds(options, boundMillis);
    checkBoundOptions(this.bounds, { ...options });
  }

  protected get typeName(): string {
    return 'time';
  }

  min(time: TimeInput): TimeValidator {
    return new TimeValidator({ ...this.options, min: time });
  }

  max(time: TimeInput): TimeValidator {
    return new TimeValidator({ ...this.options, max: time });
  }

  gt(time: TimeInput): TimeValidator {
    return new TimeValidator({ ...this.options, gt: time });
  }

  lt(time: TimeInput): TimeValidator {
    return new TimeValidator({ ...this.options, lt: time });
  }

  validate(value: unknown): ValidationResult<TimeOfDay> {
    if (value === undefined) {
      return required();
    }

    const time = value instanceof Date || typeof value === 'string' ? toTime(value) : undefined;
    if (!time) {
      return typeError('an ISO 8601 time string or Date');
    }

    return checkBounds(toMillis(time), this.bounds, (bound) => formatTime(fromMillis(bound))) ?? ok(time);
  }

  serialize(value: TimeOfDay): string {
    return formatTime(value);
  }
}
