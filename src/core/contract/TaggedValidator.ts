import { MESSAGES } from '../constants';
import { ContractError, SchemaDefinitionError } from '../types/Errors';
import { BaseValidator } from './BaseValidator';
import type { EnumMember } from './EnumValidator';
import { isMapping, readField } from './mapping';
import type { Cleaned, Schema } from './Schema';
import { TagValidator } from './TagValidator';
import { fail, fieldSegment, prefixIssues, required, typeError } from './Validator';
import type { ValidationResult } from './Validator';

/**
 * Record type of one schema
 */
export type SchemaShape<S> = S extends Schema<infer T extends object> ? T : never;

/**
 * Tagged union of schemas: the value of one field picks the schema that
 * validates the whole mapping.
 *
 * Each schema declares the tag field with `v.tag()`. A tag claimed by two
 * schemas is a definition error. A missing tag is `required`, an unknown one
 * `invalid_choice`, both reported under the tag field.
 */
export class TaggedValidator<T extends object> extends BaseValidator<Cleaned<T>> {
  private readonly routes: ReadonlyMap<EnumMember, Schema<T>>;

  constructor(
    private readonly tagField: string,
    schemas: readonly Schema<T>[]
  ) {
    super();
    if (schemas.length < 2) {
      throw SchemaDefinitionError.tooFewBranches('tagged() needs at least two schemas', { field: tagField });
    }

    const routes = new Map<EnumMember, Schema<T>>();
    for (const candidate of schemas) {
      const tag = candidate.fieldValidator(tagField);
      if (!(tag instanceof TagValidator)) {
        throw SchemaDefinitionError.invalidConfig(`${candidate.name} must declare "${tagField}" with v.tag()`, {
          schema: candidate.name,
          field: tagField,
        });
      }
      for (const value of tag.tags) {
        const claimed = routes.get(value);
        if (claimed) {
          throw SchemaDefinitionError.duplicateTag(
            `Tag ${String(value)} is used by ${claimed.name} and ${candidate.name}`,
            { field: tagField, tag: value }
          );
        }
        routes.set(value, candidate);
      }
    }
    this.routes = routes;
  }

  protected get typeName(): string {
    return `tagged<${[...new Set(this.routes.values())].map((candidate) => candidate.name).join(' | ')}>`;
  }

  validate(value: unknown): ValidationResult<Cleaned<T>> {
    if (value === undefined) {
      return required();
    }

    if (!isMapping(value)) {
      return typeError('a mapping');
    }

    const tag = readField(value, this.tagField);
    const target = this.route(tag);
    if (!target) {
      const failure =
        tag === undefined
          ? required()
          : fail('invalid_choice', MESSAGES.invalidChoice([...this.routes.keys()].map(String)));
      return { success: false, errors: prefixIssues(fieldSegment(this.tagField), failure.errors) };
    }

    return target.safeValidate(value);
  }

  serialize(record: Cleaned<T>): Record<string, unknown> {
    const tag = new Map<string, unknown>(Object.entries(record)).get(this.tagField);
    const target = this.route(tag);
    if (!target) {
      throw ContractError.unknownTag(`No schema is tagged ${String(tag)}`, { field: this.tagField });
    }
    return target.serialize(record);
  }

  private route(tag: unknown): Schema<T> | undefined {
    for (const [value, target] of this.routes) {
      if (value === tag) {
        return target;
      }
    }
    return undefined;
  }}

/**
 * Create a tagged union from schemas that each declare `tagField` with `v.tag()`
 *
 * @example
 * ```typescript
 * const circle = schema({ kind: v.tag('circle'), radius: v.float() });
 * const square = schema({ kind: v.tag('square'), side: v.float() });
 * taggedOf('kind', circle, square) // circle or square record, picked by `kind`
 * ```
 */
export function taggedOf<S extends readonly Schema<object>[]>(
  tagField: string,
  ...schemas: S
): TaggedValidator<SchemaShape<S[number]>>;
export function taggedOf(tagField: string, ...schemas: readonly Schema<object>[]): TaggedValidator<object> {
  return new TaggedValidator(tagField, schemas);
}
