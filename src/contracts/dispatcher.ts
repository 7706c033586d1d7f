/**
 * Guarded Dispatch
 *
 * Pairs each contract with the operation it protects. A call is validated
 * first and only a passing bundle reaches the executor.
 */

import { Violation } from '../shared/errors/violation.js';
import { UnknownOperationError } from '../shared/errors/contract.js';
import { createChildLogger } from '../shared/logging/structured.js';
import { type OperationArgs, type OperationName } from './definitions.js';
import { guard } from './guard.js';
import type { RawKeywords } from './types.js';

const logger = createChildLogger({ component: 'contracts' });

/**
 * An operation split into its validation and execution halves
 */
export interface GuardedOperation<K extends OperationName, R> {
  readonly operation: K;
  validate(args?: readonly unknown[], kwargs?: RawKeywords): OperationArgs[K];
  execute(args: OperationArgs[K]): R;
  /** validate, then execute */
  call(args?: readonly unknown[], kwargs?: RawKeywords): R;
}

/**
 * Wrap an executor so that it only ever runs on validated arguments
 */
export function guarded<K extends OperationName, R>(
  operation: K,
  execute: (args: OperationArgs[K]) => R
): GuardedOperation<K, R> {
  const validate = (args?: readonly unknown[], kwargs?: RawKeywords): OperationArgs[K] => {
    try {
      const validated = guard(operation, args, kwargs);
      logger.debug('Contract passed', { operation });
      return validated;
    } catch (error) {
      if (error instanceof Violation) {
        logger.debug('Contract violated', {
          operation,
          code: error.code,
          field: error.field,
        });
      }
      throw error;
    }
  };

  return {
    operation,
    validate,
    execute,
    call: (args, kwargs) => execute(validate(args, kwargs)),
  };
}

/**
 * Name-keyed table of guarded operations
 */
export class OperationDispatcher {
  private handlers = new Map<string, (args?: readonly unknown[], kwargs?: RawKeywords) => unknown>();

  register<K extends OperationName, R>(
    operation: K,
    execute: (args: OperationArgs[K]) => R
  ): GuardedOperation<K, R> {
    const op = guarded(operation, execute);
    this.handlers.set(operation, op.call);
    return op;
  }

  has(operation: string): boolean {
    return this.handlers.has(operation);
  }

  operations(): string[] {
    return [...this.handlers.keys()].sort();
  }

  /**
   * Validate and run the named operation
   *
   * @throws UnknownOperationError if nothing is registered under the name
   */
  invoke(operation: string, args: readonly unknown[] = [], kwargs: RawKeywords = {}): unknown {
    const handler = this.handlers.get(operation);
    if (!handler) {
      throw new UnknownOperationError(operation, this.operations());
    }
    return handler(args, kwargs);
  }
}
