import { describe, expect, it } from 'vitest';

import {
  typeCheck,
  typeCheckList,
  checkInstance,
  checkCallable,
  checkRequired,
  checkValue,
  checkUint32,
  checkPositive,
  checkOneOf,
  checkUniqueListOfWords,
  kindOf,
  toResult,
  unwrapResult,
  validResult,
  invalidResult,
} from '../../../src/shared/validation/index.js';
import { TypeViolation, ValueViolation } from '../../../src/shared/errors/index.js';
import { UINT32_MAX, describeValue } from '../../../src/shared/config/limits.js';

describe('Primitive checkers', () => {
  describe('kindOf', () => {
    it('describes runtime kinds', () => {
      expect(kindOf(null)).toBe('null');
      expect(kindOf([1])).toBe('array');
      expect(kindOf(3)).toBe('integer');
      expect(kindOf(3.5)).toBe('number');
      expect(kindOf({})).toBe('object');
      expect(kindOf(new Map())).toBe('Map');
      expect(kindOf('x')).toBe('string');
    });

    it('describes objects whose prototype has no constructor', () => {
      const orphan: unknown = Object.create(Object.create(null));
      expect(kindOf(orphan)).toBe('object');
      expect(() => checkInstance(orphan, Date, 'createdAt')).toThrow(
        "Invalid type for 'createdAt': expected Date, received object"
      );
    });
  });

  describe('typeCheck', () => {
    it('accepts any of the allowed kinds', () => {
      expect(() => typeCheck('a', ['string', 'null'], 'p')).not.toThrow();
      expect(() => typeCheck(null, ['string', 'null'], 'p')).not.toThrow();
    });

    it('rejects non-integers for the integer kind', () => {
      expect(() => typeCheck(1.5, ['integer'], 'topK')).toThrow(
        "Invalid type for 'topK': expected integer, received number"
      );
    });

    it('does not treat arrays or class instances as plain objects', () => {
      expect(() => typeCheck([], ['object'], 'p')).toThrow(TypeViolation);
      expect(() => typeCheck(new Map(), ['object'], 'p')).toThrow(TypeViolation);
    });

    it('typeCheckList pairs values with names', () => {
      expect(() => typeCheckList(['a', 2], ['string'], ['first', 'second'])).toThrow(
        "Invalid type for 'second': expected string, received integer"
      );
    });
  });

  describe('checkInstance and checkCallable', () => {
    class Handle {}

    it('checks class membership', () => {
      expect(() => checkInstance(new Handle(), Handle, 'h')).not.toThrow();
      expect(() => checkInstance({}, Handle, 'h')).toThrow(
        "Invalid type for 'h': expected Handle, received object"
      );
    });

    it('checks invocability', () => {
      expect(() => checkCallable(() => 1, 'fn')).not.toThrow();
      expect(() => checkCallable(42, 'fn')).toThrow(TypeViolation);
    });
  });

  describe('value checks', () => {
    it('checkRequired rejects null and undefined', () => {
      expect(() => checkRequired(undefined, 'word')).toThrow(ValueViolation);
      expect(() => checkRequired(null, 'word')).toThrow(ValueViolation);
      expect(() => checkRequired('', 'word')).not.toThrow();
    });

    it('checkValue is inclusive on both ends', () => {
      expect(() => checkValue(-1, [-1, 5], 'v')).not.toThrow();
      expect(() => checkValue(5, [-1, 5], 'v')).not.toThrow();
      expect(() => checkValue(6, [-1, 5], 'v')).toThrow(ValueViolation);
    });

    it('checkUint32 separates kind errors from range errors', () => {
      expect(() => checkUint32('1', 'freq')).toThrow(TypeViolation);
      expect(() => checkUint32(-1, 'freq')).toThrow(ValueViolation);
      expect(() => checkUint32(UINT32_MAX + 1, 'freq')).toThrow(ValueViolation);
      expect(() => checkUint32(0, 'freq')).not.toThrow();
      expect(() => checkUint32(UINT32_MAX, 'freq')).not.toThrow();
    });

    it('checkPositive rejects zero', () => {
      expect(() => checkPositive(0, 'topK')).toThrow("Invalid value for 'topK': 0 must be greater than 0");
      expect(() => checkPositive(1, 'topK')).not.toThrow();
    });

    it('checkOneOf lists the allowed values', () => {
      expect(() => checkOneOf('fast', ['mp', 'hmm'], 'mode')).toThrow(
        "Invalid value for 'mode': must be one of: mp, hmm"
      );
      expect(() => checkOneOf(1, ['mp', 'hmm'], 'mode')).toThrow(TypeViolation);
    });
  });

  describe('checkUniqueListOfWords', () => {
    it('returns the words', () => {
      expect(checkUniqueListOfWords(['a', 'b'], 'wordList')).toEqual(['a', 'b']);
    });

    it('reports the duplicate word', () => {
      expect(() => checkUniqueListOfWords(['a', 'b', 'a'], 'wordList')).toThrow(
        "Invalid value for 'wordList': contains duplicate word: \"a\""
      );
    });

    it('names the offending element', () => {
      expect(() => checkUniqueListOfWords(['a', 1], 'wordList')).toThrow(
        "Invalid type for 'wordList[1]': expected string, received integer"
      );
    });

    it('requires an array', () => {
      expect(() => checkUniqueListOfWords('a', 'wordList')).toThrow(TypeViolation);
    });
  });

  describe('results', () => {
    it('toResult captures violations', () => {
      const result = toResult(() => checkUint32(-5, 'freq'));
      expect(result.valid).toBe(false);
      expect(result.errors[0]).toBeInstanceOf(ValueViolation);
    });

    it('toResult lets other errors propagate', () => {
      expect(() =>
        toResult(() => {
          throw new RangeError('boom');
        })
      ).toThrow(RangeError);
    });

    it('unwrapResult returns the value or throws the first violation', () => {
      expect(unwrapResult(validResult(3))).toBe(3);
      const violation = new ValueViolation('x', 1, 'bad');
      expect(() => unwrapResult(invalidResult([violation]))).toThrow(violation);
    });
  });

  describe('describeValue', () => {
    it('renders values compactly', () => {
      expect(describeValue('a')).toBe('"a"');
      expect(describeValue(new Set(['b']))).toBe('{"b"}');
      expect(describeValue(undefined)).toBe('undefined');
      expect(describeValue('x'.repeat(100))).toHaveLength(80);
    });

    it('falls back to a tag for values JSON cannot serialize', () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;
      expect(describeValue(cyclic)).toBe('[object]');
      expect(describeValue([1n])).toBe('[array]');
    });
  });
});
