import { MESSAGES } from '../constants';
import { BaseValidator } from './BaseValidator';
import { checkSize, checkSizeOptions, valueIdentity } from './container';
import { FrozenMap } from './frozen';
import type { SizeOptions } from './container';
import { isMapping, mappingEntries } from './mapping';
import { StringValidator } from './StringValidator';
import { entrySegment, keySegment, ok, prefixIssues, required, typeError } from './Validator';
import type { Issue, Validator, ValidationResult } from './Validator';

export type MapOptions = SizeOptions;

/**
 * Map validator: validates every key and every value of a plain object or Map
 *
 * Value failures are reported under the cleaned key (`scores[en]`). A key
 * that fails has no cleaned form, so its failures are reported under the
 * entry's position (`scores[#1]`) and its value is not checked. Two raw keys
 * that clean to equal keys fail with `duplicate_key`. The cleaned map is
 * read-only.
 */
export class MapValidator<K, V> extends BaseValidator<ReadonlyMap<K, V>> {
  private readonly options: Readonly<SizeOptions>;

  constructor(
    private readonly key: Validator<K>,
    private readonly value: Validator<V>,
    options: MapOptions = {}
  ) {
    super();
    this.options = checkSizeOptions(options);
  }

  protected get typeName(): string {
    return `map<${this.key.meta.type}, ${this.value.meta.type}>`;
  }

  validate(raw: unknown): ValidationResult<ReadonlyMap<K, V>> {
    if (raw === undefined) {
      return required();
    }

    if (!isMapping(raw)) {
      return typeError('a mapping');
    }

    const entries = mappingEntries(raw);
    const sizeFailure = checkSize(entries.length, this.options);
    if (sizeFailure) {
      return sizeFailure;
    }

    const result: Array<[K, V]> = [];
    const seen = new Set<unknown>();
    const errors: Issue[] = [];

    entries.forEach(([rawKey, rawValue], position) => {
      const keyResult = this.key.validate(rawKey);
      if (!keyResult.success) {
        errors.push(...prefixIssues(entrySegment(position), keyResult.errors));
        return;
      }

      const cleanedKey = keyResult.data;
      const label = this.keyLabel(cleanedKey);
      const segment = keySegment(label);
      const identity = valueIdentity(this.key, cleanedKey);
      if (seen.has(identity)) {
        errors.push({ path: [segment], message: MESSAGES.duplicateKey(label), kind: 'duplicate_key' });
        return;
      }
      seen.add(identity);

      const valueResult = this.value.validate(rawValue);
      if (!valueResult.success) {
        errors.push(...prefixIssues(segment, valueResult.errors));
        return;
      }
      result.push([cleanedKey, valueResult.data]);
    });

    if (errors.length > 0) {
      return { success: false, errors };
    }
    return ok(new FrozenMap(result));
  }

  private keyLabel(key: K): string {
    return String(this.key.serialize(key));
  }

  serialize(map: ReadonlyMap<K, V>): Record<string, unknown> {
    return Object.fromEntries(
      [...map].map(([key, value]) => [this.keyLabel(key), this.value.serialize(value)])
    );
  }
}

/**
 * Create a map validator; keys default to non-blank strings
 *
 * @example
 * ```typescript
 * mapOf(v.int()) // { [name: string]: number }
 * mapOf(v.date(), { key: v.int() }) // numeric keys, even from a plain object
 * ```
 */
export function mapOf<K, V>(value: Validator<V>, options: MapOptions & { key: Validator<K> }): MapValidator<K, V>;
export function mapOf<V>(value: Validator<V>, options?: MapOptions): MapValidator<string, V>;
export function mapOf(
  value: Validator<unknown>,
  options: MapOptions & { key?: Validator<unknown> } = {}
): MapValidator<unknown, unknown> {
  const { key, ...sizes } = options;
  return new MapValidator(key ?? new StringValidator(), value, sizes);
}
