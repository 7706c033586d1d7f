/**
 * Primitive Checkers
 *
 * Fail-fast building blocks for argument contracts. Every checker throws
 * on the first unmet constraint and narrows the checked value otherwise.
 */

import { TypeViolation, ValueViolation } from '../errors/violation.js';
import { UINT32_MAX, describeValue } from '../config/limits.js';

// =============================================================================
// Value Kinds
// =============================================================================

/**
 * Runtime value kinds a parameter can be restricted to
 */
export interface ValueKinds {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
  array: unknown[];
  object: Record<string, unknown>;
  function: (...args: never[]) => unknown;
  null: null;
}

export type ValueKind = keyof ValueKinds;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function matchesKind(value: unknown, kind: ValueKind): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
    case 'function':
      return typeof value === 'function';
    case 'null':
      return value === null;
  }
}

/**
 * Describe the runtime kind of a value for a violation message
 */
export function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return 'object';
    const ctor: unknown = value.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

// =============================================================================
// Type Checkers
// =============================================================================

/**
 * Check that a value belongs to one of the allowed kinds
 */
export function typeCheck<K extends ValueKind>(
  value: unknown,
  kinds: readonly K[],
  name: string
): asserts value is ValueKinds[K] {
  if (!kinds.some((kind) => matchesKind(value, kind))) {
    throw new TypeViolation(name, kinds.join(' or '), kindOf(value), value);
  }
}

/**
 * Check several values against the same kinds, pairing each with its name
 */
export function typeCheckList<K extends ValueKind>(
  values: readonly unknown[],
  kinds: readonly K[],
  names: readonly string[]
): void {
  values.forEach((value, i) => {
    typeCheck(value, kinds, names[i] ?? `arg${i}`);
  });
}

/**
 * Check that a value is an instance of the given class
 */
export function checkInstance<T>(
  value: unknown,
  ctor: abstract new (...args: never[]) => T,
  name: string
): asserts value is T {
  if (!(value instanceof ctor)) {
    throw new TypeViolation(name, ctor.name, kindOf(value), value);
  }
}

/**
 * Check that a value is invocable
 */
export function checkCallable(
  value: unknown,
  name: string
): asserts value is (...args: never[]) => unknown {
  if (typeof value !== 'function') {
    throw new TypeViolation(name, 'callable', kindOf(value), value);
  }
}

// =============================================================================
// Value Checkers
// =============================================================================

/**
 * Check that a required value was actually supplied
 */
export function checkRequired(value: unknown, name: string): asserts value is {} {
  if (value === undefined || value === null) {
    throw ValueViolation.required(name);
  }
}

/**
 * Check that a number lies in the closed interval [low, high]
 */
export function checkValue(value: number, [low, high]: readonly [number, number], name: string): void {
  if (!(value >= low && value <= high)) {
    throw ValueViolation.outOfRange(name, value, low, high);
  }
}

/**
 * Check that a value is an integer in [0, UINT32_MAX]
 */
export function checkUint32(value: unknown, name: string): asserts value is number {
  typeCheck(value, ['integer'], name);
  checkValue(value, [0, UINT32_MAX], name);
}

/**
 * Check that a number is strictly greater than zero
 */
export function checkPositive(value: number, name: string): void {
  if (!(value > 0)) {
    throw new ValueViolation(name, value, `${describeValue(value)} must be greater than 0`);
  }
}

/**
 * Check that a value is one of a closed set of strings
 */
export function checkOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  name: string
): asserts value is T {
  typeCheck(value, ['string'], name);
  if (!allowed.some((candidate) => candidate === value)) {
    throw new ValueViolation(name, value, `must be one of: ${allowed.join(', ')}`);
  }
}

// =============================================================================
// Collection Checkers
// =============================================================================

/**
 * Check that a value is a list of strings without duplicates
 *
 * @returns the same list, narrowed
 */
export function checkUniqueListOfWords(words: unknown, name: string): string[] {
  typeCheck(words, ['array'], name);

  const seen = new Set<string>();
  const checked: string[] = [];
  words.forEach((word, i) => {
    typeCheck(word, ['string'], `${name}[${i}]`);
    if (seen.has(word)) {
      throw new ValueViolation(name, words, `contains duplicate word: ${describeValue(word)}`);
    }
    seen.add(word);
    checked.push(word);
  });
  return checked;
}
