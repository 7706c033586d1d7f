import { describe, expect, it } from 'vitest';

import { guard, safeGuard } from '../../../src/contracts/guard.js';
import {
  ArityViolation,
  TypeViolation,
  ValueViolation,
} from '../../../src/shared/errors/index.js';
import { INT32_MAX } from '../../../src/shared/config/limits.js';
import { Vocab } from '../../../src/text/vocab.js';

const vocab = Vocab.fromWords(['hello', 'world'], ['[UNK]']);

describe('lookup contract', () => {
  it('passes a vocabulary with an optional unknown token', () => {
    expect(guard('lookup', [vocab])).toEqual({ vocab, unknownToken: undefined });
    expect(guard('lookup', [vocab, '[UNK]']).unknownToken).toBe('[UNK]');
  });

  it('requires the vocabulary parameter', () => {
    expect(() => guard('lookup', [])).toThrow(ArityViolation);
  });

  it('rejects a vocabulary that is not a Vocab', () => {
    expect(() => guard('lookup', [{ hello: 0 }])).toThrow(
      "Invalid type for 'vocab': expected Vocab, received object"
    );
  });

  it('rejects an object without a constructor as a type violation', () => {
    const orphan: unknown = Object.create(Object.create(null));
    expect(() => guard('lookup', [orphan])).toThrow(
      "Invalid type for 'vocab': expected Vocab, received object"
    );
  });

  it('checks the unknown token before the vocabulary', () => {
    expect(() => guard('lookup', [{}, 7])).toThrow(
      "Invalid type for 'unknownToken': expected string, received integer"
    );
  });
});

describe('vocab.fromFile contract', () => {
  it('applies defaults', () => {
    expect(guard('vocab.fromFile', ['words.txt'])).toEqual({
      filePath: 'words.txt',
      delimiter: '',
      vocabSize: undefined,
      specialTokens: undefined,
      specialFirst: true,
    });
  });

  it('accepts -1 as the unbounded sentinel and INT32_MAX as the upper bound', () => {
    expect(guard('vocab.fromFile', ['words.txt'], { vocabSize: -1 }).vocabSize).toBe(-1);
    expect(guard('vocab.fromFile', ['words.txt'], { vocabSize: INT32_MAX }).vocabSize).toBe(INT32_MAX);
  });

  it('rejects sizes outside [-1, INT32_MAX]', () => {
    expect(() => guard('vocab.fromFile', ['words.txt'], { vocabSize: -2 })).toThrow(ValueViolation);
    expect(() => guard('vocab.fromFile', ['words.txt'], { vocabSize: INT32_MAX + 1 })).toThrow(ValueViolation);
  });

  it('rejects a non-integer size', () => {
    expect(() => guard('vocab.fromFile', ['words.txt'], { vocabSize: 10.5 })).toThrow(TypeViolation);
  });

  it('requires text for the path and delimiter', () => {
    expect(() => guard('vocab.fromFile', [42])).toThrow(
      "Invalid type for 'filePath': expected string, received integer"
    );
    expect(() => guard('vocab.fromFile', ['words.txt', null])).toThrow(
      "Invalid type for 'delimiter': expected string, received null"
    );
  });

  it('rejects duplicate special tokens', () => {
    expect(() => guard('vocab.fromFile', ['words.txt'], { specialTokens: ['<pad>', '<pad>'] })).toThrow(
      "Invalid value for 'specialTokens': contains duplicate word: \"<pad>\""
    );
  });

  it('requires a boolean specialFirst', () => {
    expect(() => guard('vocab.fromFile', ['words.txt'], { specialFirst: 'yes' })).toThrow(TypeViolation);
  });
});

describe('vocab.fromList contract', () => {
  it('passes unique words and disjoint special tokens', () => {
    expect(guard('vocab.fromList', [['a', 'b'], ['<pad>']])).toEqual({
      wordList: ['a', 'b'],
      specialTokens: ['<pad>'],
      specialFirst: true,
    });
  });

  it('rejects a duplicate word', () => {
    expect(() => guard('vocab.fromList', [['a', 'b', 'a']])).toThrow(
      "Invalid value for 'wordList': contains duplicate word: \"a\""
    );
  });

  it('rejects special tokens that overlap the word list', () => {
    expect(() => guard('vocab.fromList', [['a', 'b'], ['b', 'c']])).toThrow(
      "Invalid value for 'specialTokens': specialTokens and wordList contain duplicate words: {\"b\"}"
    );
  });

  it('carries the overlap on the violation', () => {
    try {
      guard('vocab.fromList', [['a', 'b'], ['b', 'a']]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValueViolation);
      expect(error).toMatchObject({ field: 'specialTokens', value: ['b', 'a'] });
    }
  });
});

describe('vocab.fromDict contract', () => {
  it('accepts plain objects and maps', () => {
    expect(() => guard('vocab.fromDict', [{ a: 0, b: 1 }])).not.toThrow();
    expect(() => guard('vocab.fromDict', [new Map([['a', 0]])])).not.toThrow();
  });

  it('rejects ids outside [0, INT32_MAX]', () => {
    expect(() => guard('vocab.fromDict', [{ a: -1 }])).toThrow(
      "Invalid value for 'wordDict[\"a\"]': -1 is not within the required interval [0, 2147483647]"
    );
  });

  it('rejects non-integer ids', () => {
    expect(() => guard('vocab.fromDict', [{ a: '0' }])).toThrow(TypeViolation);
  });

  it('rejects non-text keys in a map', () => {
    expect(() => guard('vocab.fromDict', [new Map([[1, 0]])])).toThrow(
      "Invalid type for 'wordDict key': expected string, received integer"
    );
  });

  it('rejects other kinds of values', () => {
    expect(() => guard('vocab.fromDict', [['a']])).toThrow(TypeViolation);
  });
});

describe('vocab.fromDataset contract', () => {
  const dataset = { name: 'corpus' };

  it('normalizes a single column name to a list', () => {
    expect(guard('vocab.fromDataset', [dataset, 'text']).columns).toEqual(['text']);
  });

  it('rejects non-text column names', () => {
    expect(() => guard('vocab.fromDataset', [dataset, ['text', 3]])).toThrow(
      "Invalid type for 'columns[1]': expected string, received integer"
    );
  });

  it.each([
    [[2, 5]],
    [[null, 5]],
    [[2, null]],
    [[3, 3]],
  ])('accepts frequency range %j', (freqRange) => {
    expect(guard('vocab.fromDataset', [dataset], { freqRange }).freqRange).toEqual(freqRange);
  });

  it('rejects a range whose low bound exceeds the high bound', () => {
    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: [5, 2] })).toThrow(
      "Invalid value for 'freqRange': lower bound 5 must not exceed upper bound 2"
    );
  });

  it('rejects a negative low bound', () => {
    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: [-1, 5] })).toThrow(
      "Invalid value for 'freqRange': lower bound -1 must not be negative"
    );
  });

  it('rejects ranges that are not pairs of integers', () => {
    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: [1, 2, 3] })).toThrow(ValueViolation);
    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: [1.5, 2] })).toThrow(ValueViolation);
    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: 5 })).toThrow(TypeViolation);
  });

  it('reports bounds that cannot be serialized as value violations', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(() => guard('vocab.fromDataset', [dataset], { freqRange: [cyclic, 5] })).toThrow(
      "Invalid value for 'freqRange': bound [object] must be an integer or absent"
    );

    const result = safeGuard('vocab.fromDataset', [dataset], { freqRange: [[1n], 5] });
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toBe(
      "Invalid value for 'freqRange': bound [array] must be an integer or absent"
    );
  });

  it('requires topK to be a positive integer', () => {
    expect(guard('vocab.fromDataset', [dataset], { topK: 100 }).topK).toBe(100);
    expect(() => guard('vocab.fromDataset', [dataset], { topK: 0 })).toThrow(ValueViolation);
    expect(() => guard('vocab.fromDataset', [dataset], { topK: '5' })).toThrow(TypeViolation);
  });

  it('checks special tokens', () => {
    expect(() => guard('vocab.fromDataset', [dataset], { specialTokens: ['x', 'x'] })).toThrow(ValueViolation);
  });
});
