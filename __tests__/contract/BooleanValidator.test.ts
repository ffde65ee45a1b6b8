import { describe, it, expect } from 'vitest';
import { v } from '../../src/core/contract/validators';
import { expectFailure, expectSuccess } from '../helpers/Result';

describe('BooleanValidator', () => {
  it('should accept booleans', () => {
    expect(expectSuccess(v.boolean().validate(true))).toBe(true);
    expect(expectSuccess(v.boolean().validate(false))).toBe(false);
  });

  it('should convert common text forms in any case', () => {
    expect(expectSuccess(v.boolean().validate('true'))).toBe(true);
    expect(expectSuccess(v.boolean().validate('FALSE'))).toBe(false);
    expect(expectSuccess(v.boolean().validate('1'))).toBe(true);
    expect(expectSuccess(v.boolean().validate(' 0 '))).toBe(false);
  });

  it('should convert 0 and 1', () => {
    expect(expectSuccess(v.boolean().validate(1))).toBe(true);
    expect(expectSuccess(v.boolean().validate(0))).toBe(false);
  });

  it('should reject other values', () => {
    expect(expectFailure(v.boolean().validate('yes'))).toEqual([
      { path: [], message: 'expected a boolean', kind: 'type_error' },
    ]);
    expect(v.boolean().validate(2).success).toBe(false);
    expect(v.boolean().validate(null).success).toBe(false);
  });

  it('should report a missing value as required', () => {
    expect(expectFailure(v.boolean().validate(undefined))[0].kind).toBe('required');
  });
});
