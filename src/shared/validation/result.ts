/**
 * Validation Results
 *
 * Non-throwing view over the checkers: a result is either the validated
 * value or the violation that stopped it.
 */

import { Violation } from '../errors/violation.js';

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T; errors: never[] }
  | { valid: false; errors: Violation[] };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value, errors: [] };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(errors: Violation[]): ValidationResult<T> {
  return { valid: false, errors };
}

/**
 * Run a throwing check and capture its violation as a result.
 * Errors that are not violations still propagate.
 */
export function toResult<T>(check: () => T): ValidationResult<T> {
  try {
    return validResult(check());
  } catch (error) {
    if (error instanceof Violation) {
      return invalidResult([error]);
    }
    throw error;
  }
}

/**
 * Unwrap a result, throwing its first violation
 */
export function unwrapResult<T>(result: ValidationResult<T>): T {
  if (result.valid) {
    return result.value;
  }
  const [first] = result.errors;
  if (first) throw first;
  throw new Error('Invalid validation result without errors');
}
