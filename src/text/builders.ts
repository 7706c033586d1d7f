/**
 * Guarded vocabulary constructors
 *
 * In-process constructors for the table-backed vocabulary sources.
 * File- and dataset-backed construction needs an external engine and is
 * exposed through OperationDispatcher instead.
 */

import { isPresent } from '../contracts/checks.js';
import { guarded } from '../contracts/dispatcher.js';
import { Vocab } from './vocab.js';

const fromList = guarded('vocab.fromList', ({ wordList, specialTokens, specialFirst }) =>
  Vocab.fromWords(wordList, specialTokens, specialFirst)
);

const fromDict = guarded('vocab.fromDict', ({ wordDict }) =>
  new Vocab(wordDict instanceof Map ? wordDict.entries() : Object.entries(wordDict))
);

const lookup = guarded('lookup', ({ vocab, unknownToken }) => (tokens: readonly string[]): number[] =>
  tokens.map((token) => {
    const id = vocab.lookup(token) ?? (isPresent(unknownToken) ? vocab.lookup(unknownToken) : undefined);
    return id ?? -1;
  })
);

/**
 * Build a vocabulary from a list of unique words.
 * Special tokens take the lowest ids when `specialFirst` is set and the
 * highest ids otherwise.
 */
export function buildVocabFromList(
  wordList: unknown,
  specialTokens?: unknown,
  specialFirst?: unknown
): Vocab {
  return fromList.call([wordList, specialTokens, specialFirst]);
}

/**
 * Build a vocabulary from a word -> id table (plain object or Map)
 */
export function buildVocabFromDict(wordDict: unknown): Vocab {
  return fromDict.call([wordDict]);
}

/**
 * Create a token -> id mapper. Tokens missing from the vocabulary map to
 * the id of `unknownToken`, or to -1 when that is absent too.
 */
export function createLookup(vocab: unknown, unknownToken?: unknown): (tokens: readonly string[]) => number[] {
  return lookup.call([vocab, unknownToken]);
}
