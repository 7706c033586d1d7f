/**
 * Call descriptors
 *
 * Declares operation parameter lists and binds positional and keyword
 * arguments against them.
 */

import { ArityViolation } from '../shared/errors/violation.js';
import { ContractError } from '../shared/errors/contract.js';
import type {
  ArgumentBundle,
  OperationSignature,
  ParameterSpec,
  RawKeywords,
} from './types.js';

/**
 * Declare a parameter the caller must supply
 */
export function required(name: string): ParameterSpec {
  return { name, required: true };
}

/**
 * Declare a parameter with a default; omitted optionals default to undefined
 */
export function optional(name: string, defaultValue?: unknown): ParameterSpec {
  return { name, required: false, default: defaultValue };
}

/**
 * Build an immutable signature. Names must be unique and every
 * required parameter must precede the optional ones.
 */
export function defineSignature(...params: ParameterSpec[]): OperationSignature {
  const seen = new Set<string>();
  let sawOptional = false;

  for (const param of params) {
    if (seen.has(param.name)) {
      throw new ContractError(`Duplicate parameter name in signature: ${param.name}`);
    }
    if (param.required && sawOptional) {
      throw new ContractError(`Required parameter '${param.name}' follows an optional parameter`);
    }
    seen.add(param.name);
    sawOptional = sawOptional || !param.required;
  }

  return Object.freeze(params.map((param) => Object.freeze({ ...param })));
}

/**
 * Render a signature the way it would be written in a call
 */
export function formatSignature(operation: string, signature: OperationSignature): string {
  const params = signature.map((param) => {
    if (param.required) return param.name;
    return param.default === undefined
      ? `${param.name}?`
      : `${param.name} = ${JSON.stringify(param.default)}`;
  });
  return `${operation}(${params.join(', ')})`;
}

/**
 * Resolve raw call arguments into a bundle keyed by parameter name.
 *
 * An `undefined` value counts as omitted, so the parameter's default applies.
 *
 * @throws ArityViolation on excess positionals, unknown keywords,
 *   a parameter bound twice, or a missing required parameter
 */
export function bindArguments(
  operation: string,
  signature: OperationSignature,
  args: readonly unknown[] = [],
  kwargs: RawKeywords = {}
): ArgumentBundle {
  if (args.length > signature.length) {
    throw ArityViolation.tooMany(operation, signature.length, args.length);
  }

  const names = new Set(signature.map((param) => param.name));
  for (const key of Object.keys(kwargs)) {
    if (!names.has(key)) {
      throw ArityViolation.unexpected(operation, key);
    }
  }

  const bundle: Record<string, unknown> = {};
  signature.forEach((param, i) => {
    const positional = i < args.length ? args[i] : undefined;
    const keyword = Object.hasOwn(kwargs, param.name) ? kwargs[param.name] : undefined;

    if (positional !== undefined && keyword !== undefined) {
      throw ArityViolation.duplicate(operation, param.name);
    }

    const supplied = positional !== undefined ? positional : keyword;
    if (supplied !== undefined) {
      bundle[param.name] = supplied;
    } else if (param.required) {
      throw ArityViolation.missing(operation, param.name);
    } else {
      bundle[param.name] = param.default;
    }
  });

  return Object.freeze(bundle);
}
