import { describe, it, expect } from 'vitest';
import { v } from '../../src/core/contract/validators';
import { ContractError } from '../../src/core/types/Errors';
import { expectFailure, expectSuccess } from '../helpers/Result';

describe('SetValidator', () => {
  it('should accept an array and collapse duplicates after cleaning', () => {
    const tags = expectSuccess(v.set(v.string()).validate(['a', ' a ', 'b']));
    expect([...tags]).toEqual(['a', 'b']);
  });

  it('should accept a Set', () => {
    const ids = expectSuccess(v.set(v.int()).validate(new Set([1, '2'])));
    expect([...ids]).toEqual([1, 2]);
  });

  it('should reject other values', () => {
    expect(expectFailure(v.set(v.int()).validate({ 0: 1 }))).toEqual([
      { path: [], message: 'expected a list or set', kind: 'type_error' },
    ]);
  });

  it('should report element failures under their position', () => {
    expect(expectFailure(v.set(v.int()).validate([1, 'x']))).toEqual([
      { path: [{ type: 'index', index: 1 }], message: 'expected an integer', kind: 'type_error' },
    ]);
  });

  it('should check size on the cleaned set', () => {
    const validator = v.set(v.int(), { minLength: 2 });

    expect(expectFailure(validator.validate([1, '1']))).toEqual([
      { path: [], message: 'length must be ≥ 2', kind: 'min_length' },
    ]);
    expect(validator.validate([1, 2]).success).toBe(true);
  });

  it('should collapse dates that clean to the same instant', () => {
    const days = expectSuccess(v.set(v.date()).validate(['2024-01-01', '2024-01-01T00:00:00Z', '2024-01-02']));

    expect([...days].map((day) => day.toISOString())).toEqual([
      '2024-01-01T00:00:00.000Z',
      '2024-01-02T00:00:00.000Z',
    ]);
  });

  it('should report holes in a sparse array as missing elements', () => {
    const sparse = [1, 2, 3];
    delete sparse[1];

    expect(expectFailure(v.set(v.int()).validate(sparse))).toEqual([
      { path: [{ type: 'index', index: 1 }], message: 'this field is required', kind: 'required' },
    ]);
  });

  it('should return a read-only set', () => {
    const ids = expectSuccess(v.set(v.int()).validate([1]));
    if (!(ids instanceof Set)) {
      throw new Error('expected a Set');
    }

    expect(() => ids.add(2)).toThrow(ContractError);
    expect(() => ids.delete(1)).toThrow('cleaned set is read-only');
    expect([...ids]).toEqual([1]);
  });

  it('should serialize to a list', () => {
    expect(v.set(v.int()).serialize(new Set([3, 4]))).toEqual([3, 4]);
  });
});
