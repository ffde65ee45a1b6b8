import { EnumValidator } from './EnumValidator';
import type { EnumMember } from './EnumValidator';

/**
 * Marks the discriminating field of a schema. Accepts only the given tags,
 * compared exactly, and lets `v.tagged()` route a mapping to this schema.
 */
export class TagValidator<T extends EnumMember> extends EnumValidator<T> {
  readonly tags: readonly T[];

  constructor(tags: readonly T[]) {
    super(tags);
    this.tags = Object.freeze([...tags]);
  }

  protected get typeName(): string {
    return `tag<${this.tags.map(String).join(' | ')}>`;
  }
}
