import { describe, it, expect } from 'vitest';
import { v } from '../../src/core/contract/validators';
import { SchemaDefinitionError } from '../../src/core/types/Errors';
import { expectFailure, expectSuccess } from '../helpers/Result';

enum Role {
  Admin = 'admin',
  Member = 'member',
}

enum Priority {
  Low,
  High,
}

describe('EnumValidator', () => {
  describe('literal members', () => {
    const status = v.enumOf(['draft', 'published'] as const);

    it('should accept a member', () => {
      expect(expectSuccess(status.validate('draft'))).toBe('draft');
    });

    it('should list the members when rejecting a value', () => {
      expect(expectFailure(status.validate('archived'))).toEqual([
        { path: [], message: 'must be one of: draft, published', kind: 'invalid_choice' },
      ]);
    });

    it('should compare without conversion', () => {
      const sizes = v.enumOf([1, 2, 3]);

      expect(expectSuccess(sizes.validate(2))).toBe(2);
      expect(sizes.validate('2').success).toBe(false);
    });

    it('should report a missing value as required', () => {
      expect(expectFailure(status.validate(undefined))[0].kind).toBe('required');
    });
  });

  describe('enum objects', () => {
    it('should accept values and member names of a string enum', () => {
      const roles = v.enumOf(Role);

      expect(expectSuccess(roles.validate('admin'))).toBe(Role.Admin);
      expect(expectSuccess(roles.validate('Member'))).toBe(Role.Member);
    });

    it('should ignore the reverse mapping of a numeric enum', () => {
      const priorities = v.enumOf(Priority);

      expect(expectSuccess(priorities.validate(1))).toBe(Priority.High);
      expect(expectSuccess(priorities.validate('Low'))).toBe(Priority.Low);
      expect(expectFailure(priorities.validate('0'))[0].message).toBe('must be one of: 0, 1');
    });
  });

  it('should require at least one member', () => {
    expect(() => v.enumOf([])).toThrow(SchemaDefinitionError);
  });
});
