/**
 * Contract Registry
 *
 * Name-keyed lookup of contracts for callers that only know an operation
 * name at run time (the CLI, dispatch tables). Typed callers use `guard`.
 */

import { DuplicateContractError, UnknownOperationError } from '../shared/errors/contract.js';
import { CONTRACTS } from './definitions.js';
import { bindArguments, formatSignature } from './signature.js';
import type { Contract, RawKeywords } from './types.js';

export class ContractRegistry {
  private contracts = new Map<string, Contract<unknown>>();

  /**
   * Register a contract under its operation name
   *
   * @throws DuplicateContractError if the name is taken
   */
  register(contract: Contract<unknown>): this {
    if (this.contracts.has(contract.operation)) {
      throw new DuplicateContractError(contract.operation);
    }
    this.contracts.set(contract.operation, contract);
    return this;
  }

  has(operation: string): boolean {
    return this.contracts.has(operation);
  }

  /**
   * @throws UnknownOperationError if no contract is registered
   */
  get(operation: string): Contract<unknown> {
    const contract = this.contracts.get(operation);
    if (!contract) {
      throw new UnknownOperationError(operation, this.list());
    }
    return contract;
  }

  /** Registered operation names, sorted */
  list(): string[] {
    return [...this.contracts.keys()].sort();
  }

  /** Human-readable call form of an operation's signature */
  describe(operation: string): string {
    const contract = this.get(operation);
    return formatSignature(contract.operation, contract.signature);
  }

  /**
   * Bind and check a call against the named contract
   */
  check(operation: string, args: readonly unknown[] = [], kwargs: RawKeywords = {}): unknown {
    const contract = this.get(operation);
    return contract.check(bindArguments(operation, contract.signature, args, kwargs));
  }
}

/**
 * Create a registry holding every built-in contract
 */
export function createDefaultRegistry(): ContractRegistry {
  const registry = new ContractRegistry();
  for (const contract of Object.values(CONTRACTS)) {
    registry.register(contract);
  }
  return registry;
}
