import { MESSAGES } from '../constants';
import { SchemaDefinitionError } from '../types/Errors';
import { BaseValidator } from './BaseValidator';
import { fail, ok, required } from './Validator';
import type { ValidationResult } from './Validator';

export type EnumMember = string | number | boolean;

/**
 * Accepts one member of a fixed set, compared by value.
 * Member names are also accepted when the set comes from an enum object.
 */
export class EnumValidator<T extends EnumMember> extends BaseValidator<T> {
  private readonly members: readonly T[];

  constructor(
    members: readonly T[],
    private readonly names: ReadonlyMap<string, T> = new Map()
  ) {
    super();
    if (members.length === 0) {
      throw SchemaDefinitionError.emptyEnum('enumOf() needs at least one member');
    }
    this.members = Object.freeze([...members]);
  }

  protected get typeName(): string {
    return `enum<${this.members.map(String).join(' | ')}>`;
  }

  validate(value: unknown): ValidationResult<T> {
    if (value === undefined) {
      return required();
    }

    const member = this.members.find((candidate) => candidate === value);
    if (member !== undefined) {
      return ok(member);
    }

    if (typeof value === 'string') {
      const named = this.names.get(value);
      if (named !== undefined) {
        return ok(named);
      }
    }

    return fail('invalid_choice', MESSAGES.invalidChoice(this.members.map(String)));
  }
}

/**
 * Create an enum validator from a list of literals or a TypeScript enum
 *
 * @example
 * ```typescript
 * enumOf(['draft', 'published'] as const)
 *
 * enum Role { Admin = 'admin', Member = 'member' }
 * enumOf(Role) // accepts 'admin' or 'Admin', yields Role.Admin
 * ```
 */
export function enumOf<T extends EnumMember>(members: readonly T[]): EnumValidator<T>;
export function enumOf<E extends Record<string, string | number>>(enumObject: E): EnumValidator<E[keyof E]>;
export function enumOf(
  source: readonly EnumMember[] | Readonly<Record<string, string | number>>
): EnumValidator<EnumMember> {
  if (Array.isArray(source)) {
    return new EnumValidator<EnumMember>(source);
  }

  const names = new Map<string, EnumMember>();
  for (const [name, value] of Object.entries(source)) {
    // numeric enums also map each value back to its name
    if (Number.isNaN(Number(name))) {
      names.set(name, value);
    }
  }
  return new EnumValidator([...names.values()], names);
}
