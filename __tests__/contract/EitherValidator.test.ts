import { describe, it, expect } from 'vitest';
import { schema } from '../../src/core/contract/Schema';
import { v } from '../../src/core/contract/validators';
import { SchemaDefinitionError } from '../../src/core/types/Errors';
import { expectFailure, expectSuccess } from '../helpers/Result';

describe('EitherValidator', () => {
  const idOrName = v.either({ id: v.int(), name: v.string().min(2) });

  it('should return the first matching branch with its tag', () => {
    expect(expectSuccess(idOrName.validate(7))).toEqual({ tag: 'id', value: 7 });
    expect(expectSuccess(idOrName.validate('ada'))).toEqual({ tag: 'name', value: 'ada' });
  });

  it('should try branches in declaration order', () => {
    expect(expectSuccess(idOrName.validate('42'))).toEqual({ tag: 'id', value: 42 });
  });

  it('should explain why every branch rejected the value', () => {
    expect(expectFailure(idOrName.validate('a'))).toEqual([
      {
        path: [],
        message: 'no variant matched (id: expected an integer; name: length must be ≥ 2)',
        kind: 'no_match',
      },
    ]);
  });

  it('should state a reason shared by several branches once', () => {
    const validator = v.either({ small: v.int().max(10), big: v.int().min(100), label: v.string() });

    expect(expectFailure(validator.validate(true))).toEqual([
      {
        path: [],
        message: 'no variant matched (small, big: expected an integer; label: expected a string)',
        kind: 'no_match',
      },
    ]);
  });

  it('should include nested paths in the reasons', () => {
    const point = schema({ x: v.int(), y: v.int() });
    const target = v.either({ point: v.nested(point), label: v.int() });

    const errors = expectFailure(target.validate({ x: 1 }));
    expect(errors[0].message).toBe('no variant matched (point: y: this field is required; label: expected an integer)');
  });

  it('should report a missing value as required', () => {
    expect(expectFailure(idOrName.validate(undefined))).toEqual([
      { path: [], message: 'this field is required', kind: 'required' },
    ]);
  });

  it('should accept a missing value when a branch does', () => {
    const validator = v.either({ count: v.int(), none: v.optional(v.int()) });
    expect(expectSuccess(validator.validate(undefined))).toEqual({ tag: 'none', value: null });
  });

  it('should serialize through the matching branch', () => {
    const validator = v.either({ when: v.date(), count: v.int() });
    const variant = expectSuccess(validator.validate('2024-05-01T00:00:00.000Z'));

    expect(validator.serialize(variant)).toBe('2024-05-01T00:00:00.000Z');
  });

  it('should require at least two branches', () => {
    expect(() => v.either({ only: v.int() })).toThrow(SchemaDefinitionError);
  });

  it('should describe its branches', () => {
    expect(idOrName.meta.type).toBe('either<int | string>');
  });
});
