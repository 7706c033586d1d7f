/**
 * Shape checks shared between several contracts
 */

import { TypeViolation, ValueViolation } from '../shared/errors/violation.js';
import { INT32_MAX, describeValue } from '../shared/config/limits.js';
import {
  checkInstance,
  checkPositive,
  checkRequired,
  checkUniqueListOfWords,
  checkUint32,
  checkValue,
  kindOf,
  typeCheck,
} from '../shared/validation/validators.js';
import { Vocab } from '../text/vocab.js';
import type { Optional } from './types.js';

/** Pad token and pad width */
export type PadSpec = readonly [token: string, width: number];

/** Inclusive frequency bounds; an absent bound is open */
export type FreqRange = readonly [low: Optional<number>, high: Optional<number>];

/** A word -> id table as a plain object or a Map */
export type WordDict = Readonly<Record<string, number>> | Map<string, number>;

export function isPresent<T>(value: Optional<T>): value is T {
  return value !== undefined && value !== null;
}

/**
 * Optional list of special tokens: strings, no duplicates
 */
export function checkSpecialTokens(value: unknown, name = 'specialTokens'): string[] | undefined {
  if (!isPresent(value)) return undefined;
  return checkUniqueListOfWords(value, name);
}

/**
 * Required vocabulary: present, then of the recognized type
 */
export function checkVocab(value: unknown, name = 'vocab'): asserts value is Vocab {
  checkRequired(value, name);
  checkInstance(value, Vocab, name);
}

/**
 * Optional text parameter
 */
export function checkOptionalText(value: unknown, name: string): asserts value is Optional<string> {
  if (isPresent(value)) {
    typeCheck(value, ['string'], name);
  }
}

/**
 * A parameter that must be supplied and must be text
 */
export function checkRequiredText(value: unknown, name: string): asserts value is string {
  checkRequired(value, name);
  typeCheck(value, ['string'], name);
}

/**
 * Token bound used by sub-word tokenizers: an unsigned 32-bit integer
 */
export function checkMaxBytesPerToken(value: unknown, name = 'maxBytesPerToken'): asserts value is number {
  checkUint32(value, name);
}

/**
 * A (text, non-negative integer) pair. The width is checked separately
 * so that both pads are shape-checked before either width.
 */
export function checkPadShape(value: unknown, name: string): asserts value is PadSpec {
  if (
    !Array.isArray(value) ||
    value.length !== 2 ||
    typeof value[0] !== 'string' ||
    !Number.isInteger(value[1])
  ) {
    throw new ValueViolation(
      name,
      value,
      'needs to be a pair of (string, integer): the pad token and the pad width'
    );
  }
}

export function checkPadWidth(pad: PadSpec, name: string): void {
  if (pad[1] < 0) {
    throw new ValueViolation(name, pad, `pad width ${pad[1]} must not be negative`);
  }
}

/**
 * Gram sizes: a positive integer or a non-empty list of them.
 *
 * @returns the sizes as a list
 */
export function normalizeGramSizes(value: unknown, name = 'n'): number[] {
  const grams = typeof value === 'number' ? [value] : value;

  if (!Array.isArray(grams) || grams.length === 0) {
    throw new ValueViolation(name, value, 'needs to be a positive integer or a non-empty list of positive integers');
  }

  return grams.map((gram: unknown, i) => {
    typeCheck(gram, ['integer'], `${name}[${i}]`);
    checkPositive(gram, `${name}[${i}]`);
    return gram;
  });
}

/**
 * Column selection: a single name becomes a one-element list
 */
export function normalizeColumns(value: unknown, name = 'columns'): string[] | undefined {
  if (!isPresent(value)) return undefined;

  const columns = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(columns)) {
    throw new TypeViolation(name, 'string or array', kindOf(value), value);
  }

  return columns.map((column: unknown, i) => {
    typeCheck(column, ['string'], `${name}[${i}]`);
    return column;
  });
}

/**
 * Frequency bounds: a pair of optional integers with 0 <= low <= high
 */
export function checkFreqRange(value: unknown, name = 'freqRange'): asserts value is Optional<FreqRange> {
  if (!isPresent(value)) return;

  typeCheck(value, ['array'], name);
  if (value.length !== 2) {
    throw new ValueViolation(name, value, `needs to be a pair of bounds, received ${value.length} element(s)`);
  }

  const [low, high] = value;
  for (const bound of [low, high]) {
    if (isPresent(bound) && !Number.isInteger(bound)) {
      throw new ValueViolation(name, value, `bound ${describeValue(bound)} must be an integer or absent`);
    }
  }

  if (typeof low === 'number' && low < 0) {
    throw new ValueViolation(name, value, `lower bound ${low} must not be negative`);
  }
  if (typeof low === 'number' && typeof high === 'number' && low > high) {
    throw new ValueViolation(name, value, `lower bound ${low} must not exceed upper bound ${high}`);
  }
}

/**
 * Optional positive integer
 */
export function checkOptionalPositiveInteger(value: unknown, name: string): asserts value is Optional<number> {
  if (!isPresent(value)) return;
  typeCheck(value, ['integer'], name);
  checkPositive(value, name);
}

/**
 * Word table: text keys mapped to ids in [0, INT32_MAX]
 */
export function checkWordDict(value: unknown, name = 'wordDict'): asserts value is WordDict {
  let entries: Array<[unknown, unknown]>;
  if (value instanceof Map) {
    entries = [...value.entries()];
  } else {
    typeCheck(value, ['object'], name);
    entries = Object.entries(value);
  }

  for (const [word, id] of entries) {
    typeCheck(word, ['string'], `${name} key`);
    const field = `${name}[${JSON.stringify(word)}]`;
    typeCheck(id, ['integer'], field);
    checkValue(id, [0, INT32_MAX], field);
  }
}
