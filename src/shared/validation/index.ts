/**
 * Input Validation Framework
 *
 * Primitive checkers and result helpers shared by every argument contract.
 */

export * from './validators.js';
export * from './result.js';
