import { MESSAGES } from '../constants';
import { SchemaDefinitionError } from '../types/Errors';
import { BaseValidator } from './BaseValidator';
import { fail, ok, required, summarizeIssues } from './Validator';
import type { Infer, Validator, ValidationResult } from './Validator';

/**
 * Named candidate validators, tried in declaration order
 */
export type Branches = Record<string, Validator<unknown>>;

/**
 * Tagged result of an Either: which branch matched, and its value
 */
export type Variant<B extends Branches> = {
  [K in keyof B & string]: { readonly tag: K; readonly value: Infer<B[K]> };
}[keyof B & string];

/**
 * Union validator: the first branch that accepts the value wins.
 *
 * When every branch rejects the value, the failure message carries the reason
 * each branch gave. Branches that failed for the same reason share one entry
 * (`a, b: expected an integer`).
 */
export class EitherValidator<B extends Branches> extends BaseValidator<Variant<B>> {
  private readonly tags: readonly string[];

  constructor(private readonly branches: B) {
    super();
    this.tags = Object.keys(branches);
    if (this.tags.length < 2) {
      throw SchemaDefinitionError.tooFewBranches('either() needs at least two branches', { branches: this.tags });
    }
  }

  protected get typeName(): string {
    return `either<${this.tags.map((tag) => this.branches[tag].meta.type).join(' | ')}>`;
  }

  validate(value: unknown): ValidationResult<Variant<B>> {
    // reason text -> tags that gave it, in first-seen order
    const reasons = new Map<string, string[]>();

    for (const tag of this.tags) {
      const result = this.branches[tag].validate(value);
      if (result.success) {
        // the tag and the value come from the same branch, which is what Variant<B> pairs
        return ok({ tag, value: result.data } as Variant<B>);
      }
      const reason = summarizeIssues(result.errors);
      reasons.set(reason, [...(reasons.get(reason) ?? []), tag]);
    }

    if (value === undefined) {
      return required();
    }

    const summary = [...reasons].map(([reason, tags]) => `${tags.join(', ')}: ${reason}`);
    return fail('no_match', MESSAGES.noMatch(summary));
  }

  serialize(variant: Variant<B>): unknown {
    return this.branches[variant.tag].serialize(variant.value);
  }
}
