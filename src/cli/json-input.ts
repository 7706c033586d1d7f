/**
 * JSON argument parsing for the check command.
 *
 * `{"$vocab": ["a", "b"]}` anywhere in the input becomes a Vocab built
 * from that word list.
 */

import { InvalidArgumentError } from 'commander';
import { buildVocabFromList } from '../text/builders.js';
import { TRUNCATE_BUNDLE, truncate } from '../shared/config/limits.js';
import type { RawKeywords } from '../contracts/types.js';
import { isViolation } from '../shared/errors/index.js';

const VOCAB_KEY = '$vocab';

function isVocabSpec(value: unknown): value is { [VOCAB_KEY]: unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    VOCAB_KEY in value
  );
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text, (_key, value: unknown) =>
      isVocabSpec(value) ? buildVocabFromList(value[VOCAB_KEY]) : value
    );
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InvalidArgumentError(`Not valid JSON: ${error.message}`);
    }
    if (isViolation(error)) {
      throw new InvalidArgumentError(`Invalid ${VOCAB_KEY}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Parse a JSON array of positional arguments
 */
export function parseJsonArgs(text: string): unknown[] {
  const parsed = parseJson(text);
  if (!Array.isArray(parsed)) {
    throw new InvalidArgumentError('Positional arguments must be a JSON array.');
  }
  return parsed;
}

/**
 * Parse a JSON object of keyword arguments
 */
export function parseJsonKwargs(text: string): RawKeywords {
  const parsed = parseJson(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError('Keyword arguments must be a JSON object.');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Render a validated bundle for display
 */
export function renderBundle(bundle: unknown): string {
  const json = JSON.stringify(
    bundle,
    (_key, value: unknown) => {
      if (typeof value === 'function') return '[function]';
      if (value instanceof Map) return Object.fromEntries(value);
      return value;
    },
    2
  );
  return truncate(json ?? 'undefined', TRUNCATE_BUNDLE);
}
