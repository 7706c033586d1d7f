/**
 * Argument Contract Layer
 */

export * from './types.js';
export * from './signature.js';
export * from './checks.js';
export * from './definitions.js';
export * from './guard.js';
export * from './registry.js';
export * from './dispatcher.js';
