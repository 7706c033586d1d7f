/**
 * text-contracts error system
 *
 * Error hierarchy:
 *   TextContractsError (base)
 *   ├── Violation
 *   │   ├── ArityViolation
 *   │   ├── TypeViolation
 *   │   └── ValueViolation
 *   └── ContractError
 *       ├── UnknownOperationError
 *       └── DuplicateContractError
 */

import { TextContractsError } from './base.js';
import { Violation } from './violation.js';
export { TextContractsError } from './base.js';

export {
  Violation,
  ArityViolation,
  TypeViolation,
  ValueViolation,
} from './violation.js';
export type { ViolationCode } from './violation.js';

export {
  ContractError,
  UnknownOperationError,
  DuplicateContractError,
} from './contract.js';
export type { ContractErrorCode } from './contract.js';

/**
 * Type guard to check if an error is a text-contracts error
 */
export function isTextContractsError(error: unknown): error is TextContractsError {
  return error instanceof TextContractsError;
}

/**
 * Type guard to check if an error is an argument violation
 */
export function isViolation(error: unknown): error is Violation {
  return error instanceof Violation;
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof TextContractsError) {
    return error.code;
  }
  if (error instanceof Error) {
    return 'UNKNOWN_ERROR';
  }
  return 'INVALID_ERROR';
}
