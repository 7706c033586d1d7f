/**
 * Contract registry errors
 *
 * Raised when the contract table itself is misused, as opposed to a
 * caller passing bad arguments.
 */

import { TextContractsError } from './base.js';

/**
 * Contract error codes
 */
export type ContractErrorCode =
  | 'CONTRACT_ERROR'
  | 'UNKNOWN_OPERATION'
  | 'DUPLICATE_CONTRACT';

/**
 * Base class for all contract registry errors
 */
export class ContractError extends TextContractsError {
  declare readonly code: ContractErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    (this as { code: ContractErrorCode }).code = 'CONTRACT_ERROR';
  }
}

/**
 * No contract is registered under the requested operation name
 */
export class UnknownOperationError extends ContractError {
  declare readonly code: 'UNKNOWN_OPERATION';
  readonly operation: string;
  readonly availableOperations: string[];

  constructor(operation: string, availableOperations: string[] = []) {
    const available = availableOperations.length
      ? ` Available operations: ${availableOperations.join(', ')}`
      : '';
    super(`Unknown operation: ${operation}.${available}`);
    (this as { code: 'UNKNOWN_OPERATION' }).code = 'UNKNOWN_OPERATION';
    this.operation = operation;
    this.availableOperations = availableOperations;
  }
}

/**
 * A second contract was registered for the same operation
 */
export class DuplicateContractError extends ContractError {
  declare readonly code: 'DUPLICATE_CONTRACT';
  readonly operation: string;

  constructor(operation: string) {
    super(`A contract is already registered for operation: ${operation}`);
    (this as { code: 'DUPLICATE_CONTRACT' }).code = 'DUPLICATE_CONTRACT';
    this.operation = operation;
  }
}
