/**
 * Shared Configuration Module
 *
 * Re-exports all configuration constants and utilities
 */

export * from './env.js';
export * from './limits.js';
