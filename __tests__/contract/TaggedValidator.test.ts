import { describe, it, expect } from 'vitest';
import { schema } from '../../src/core/contract/Schema';
import { TaggedValidator } from '../../src/core/contract/TaggedValidator';
import { v } from '../../src/core/contract/validators';
import { formatPath } from '../../src/core/contract/Validator';
import { ContractError, SchemaDefinitionError } from '../../src/core/types/Errors';
import { expectFailure, expectSuccess } from '../helpers/Result';

const circle = schema({ kind: v.tag('circle'), radius: v.float().gt(0) }, { name: 'Circle' });
const square = schema({ kind: v.tag('square', 'box'), side: v.float().gt(0) }, { name: 'Square' });

describe('TagValidator', () => {
  it('should accept only its tags, compared exactly', () => {
    const tag = v.tag('square', 'box');

    expect(expectSuccess(tag.validate('box'))).toBe('box');
    expect(expectFailure(tag.validate('Box'))).toEqual([
      { path: [], message: 'must be one of: square, box', kind: 'invalid_choice' },
    ]);
  });

  it('should report its tags as its type', () => {
    expect(v.tag('a', 1).meta.type).toBe('tag<a | 1>');
  });
});

describe('TaggedValidator', () => {
  const shape = v.tagged('kind', circle, square);

  it('should validate with the schema the tag selects', () => {
    expect(expectSuccess(shape.validate({ kind: 'circle', radius: '1.5' }))).toEqual({ kind: 'circle', radius: 1.5 });
    expect(expectSuccess(shape.validate({ kind: 'box', side: 2 }))).toEqual({ kind: 'box', side: 2 });
  });

  it('should report failures of the selected schema only', () => {
    const errors = expectFailure(shape.validate({ kind: 'square', radius: 1 }));

    expect(errors).toEqual([
      { path: [{ type: 'field', name: 'side' }], message: 'this field is required', kind: 'required' },
    ]);
  });

  it('should report an unknown tag under the tag field', () => {
    expect(expectFailure(shape.validate({ kind: 'triangle' }))).toEqual([
      {
        path: [{ type: 'field', name: 'kind' }],
        message: 'must be one of: circle, square, box',
        kind: 'invalid_choice',
      },
    ]);
  });

  it('should report a missing tag as required', () => {
    expect(expectFailure(shape.validate({ radius: 1 }))).toEqual([
      { path: [{ type: 'field', name: 'kind' }], message: 'this field is required', kind: 'required' },
    ]);
  });

  it('should reject values that are not mappings', () => {
    expect(expectFailure(shape.validate('circle'))[0].kind).toBe('type_error');
    expect(expectFailure(shape.validate(undefined))[0].kind).toBe('required');
  });

  it('should nest inside a schema', () => {
    const drawing = schema({ shapes: v.list(shape) });
    const result = drawing.safeValidate({ shapes: [{ kind: 'circle', radius: 1 }, { kind: 'circle', radius: -1 }] });
    if (result.success) {
      throw new Error('expected failure');
    }

    expect(result.errors.map((issue) => formatPath(issue.path))).toEqual(['shapes[1].radius']);
    expect(result.errors[0].kind).toBe('gt');
  });

  it('should serialize with the schema of the record tag', () => {
    const record = expectSuccess(shape.validate({ kind: 'circle', radius: 2 }));

    expect(shape.serialize(record)).toEqual({ kind: 'circle', radius: 2 });
  });

  it('should refuse to serialize a record no schema claims', () => {
    const loose = new TaggedValidator<object>('kind', [circle, square]);

    expect(() => loose.serialize({ kind: 'hexagon' })).toThrow(ContractError);
  });

  describe('definition', () => {
    it('should reject a tag claimed by two schemas', () => {
      const disc = schema({ kind: v.tag('circle'), r: v.float() }, { name: 'Disc' });

      expect(() => v.tagged('kind', circle, disc)).toThrow('Tag circle is used by Circle and Disc');
      expect(() => v.tagged('kind', circle, disc)).toThrow(SchemaDefinitionError);
    });

    it('should require the tag field to be declared with v.tag()', () => {
      const loose = schema({ kind: v.string() }, { name: 'Loose' });

      expect(() => v.tagged('kind', circle, loose)).toThrow('Loose must declare "kind" with v.tag()');
    });

    it('should need at least two schemas', () => {
      expect(() => v.tagged('kind', circle)).toThrow(SchemaDefinitionError);
    });
  });

  it('should describe the schemas it routes to', () => {
    expect(shape.meta.type).toBe('tagged<Circle | Square>');
  });
});
