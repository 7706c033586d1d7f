/**
 * Guard entry points
 *
 * guard(operation, args, kwargs) binds a call against the operation's
 * signature, runs its contract and returns the validated bundle.
 */

import { toResult, type ValidationResult } from '../shared/validation/result.js';
import { CONTRACTS, type OperationArgs, type OperationName } from './definitions.js';
import { bindArguments } from './signature.js';
import type { Contract, RawKeywords } from './types.js';

export function getContract<K extends OperationName>(operation: K): Contract<OperationArgs[K]> {
  return CONTRACTS[operation];
}

/**
 * Validate a call to a named operation
 *
 * @throws ArityViolation, TypeViolation or ValueViolation on the first unmet predicate
 */
export function guard<K extends OperationName>(
  operation: K,
  args: readonly unknown[] = [],
  kwargs: RawKeywords = {}
): OperationArgs[K] {
  const contract = getContract(operation);
  const bundle = bindArguments(operation, contract.signature, args, kwargs);
  return contract.check(bundle);
}

/**
 * Validate a call without throwing on violations
 */
export function safeGuard<K extends OperationName>(
  operation: K,
  args: readonly unknown[] = [],
  kwargs: RawKeywords = {}
): ValidationResult<OperationArgs[K]> {
  return toResult(() => guard(operation, args, kwargs));
}
