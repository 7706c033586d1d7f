/**
 * Argument violations
 *
 * Raised by argument contracts when a caller-supplied value does not meet
 * the declared shape of an operation. A violation always aborts the call.
 */

import { TextContractsError } from './base.js';
import { describeValue } from '../config/limits.js';

/**
 * Violation codes - union of all possible violation types
 */
export type ViolationCode =
  | 'VIOLATION'
  | 'ARITY_VIOLATION'
  | 'TYPE_VIOLATION'
  | 'VALUE_VIOLATION';

/**
 * Base class for all argument violations
 */
export class Violation extends TextContractsError {
  declare readonly code: ViolationCode;
  /** Parameter the violation refers to */
  readonly field: string;
  /** Offending value, when there is one */
  readonly value: unknown;

  constructor(message: string, field: string, value?: unknown, options?: { cause?: Error }) {
    super(message, options);
    (this as { code: ViolationCode }).code = 'VIOLATION';
    this.field = field;
    this.value = value;
  }
}

/**
 * Malformed call shape: missing, unexpected or doubly bound parameters
 */
export class ArityViolation extends Violation {
  declare readonly code: 'ARITY_VIOLATION';

  constructor(message: string, field: string) {
    super(message, field);
    (this as { code: 'ARITY_VIOLATION' }).code = 'ARITY_VIOLATION';
  }

  static missing(operation: string, field: string): ArityViolation {
    return new ArityViolation(
      `${operation}() missing required argument '${field}'`,
      field
    );
  }

  static unexpected(operation: string, field: string): ArityViolation {
    return new ArityViolation(
      `${operation}() got an unexpected keyword argument '${field}'`,
      field
    );
  }

  static tooMany(operation: string, accepted: number, given: number): ArityViolation {
    return new ArityViolation(
      `${operation}() takes at most ${accepted} positional argument${accepted === 1 ? '' : 's'} but ${given} were given`,
      '*'
    );
  }

  static duplicate(operation: string, field: string): ArityViolation {
    return new ArityViolation(
      `${operation}() got multiple values for argument '${field}'`,
      field
    );
  }
}

/**
 * Wrong runtime kind of value
 */
export class TypeViolation extends Violation {
  declare readonly code: 'TYPE_VIOLATION';
  readonly expected: string;
  readonly actual: string;

  constructor(field: string, expected: string, actual: string, value?: unknown) {
    super(`Invalid type for '${field}': expected ${expected}, received ${actual}`, field, value);
    (this as { code: 'TYPE_VIOLATION' }).code = 'TYPE_VIOLATION';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Right kind of value, disallowed content
 */
export class ValueViolation extends Violation {
  declare readonly code: 'VALUE_VIOLATION';
  readonly reason: string;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid value for '${field}': ${reason}`, field, value);
    (this as { code: 'VALUE_VIOLATION' }).code = 'VALUE_VIOLATION';
    this.reason = reason;
  }

  static required(field: string): ValueViolation {
    return new ValueViolation(field, undefined, 'is required but was not provided');
  }

  static outOfRange(field: string, value: unknown, low: number, high: number): ValueViolation {
    return new ValueViolation(
      field,
      value,
      `${describeValue(value)} is not within the required interval [${low}, ${high}]`
    );
  }
}
