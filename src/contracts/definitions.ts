/**
 * Contract table
 *
 * One contract per guarded text operation. Predicates run in the listed
 * order and the first failure aborts the call.
 */

import { TypeViolation, ValueViolation } from '../shared/errors/violation.js';
import { INT32_MAX, UNBOUNDED_VOCAB_SIZE, describeValue } from '../shared/config/limits.js';
import {
  checkCallable,
  checkOneOf,
  checkUint32,
  checkUniqueListOfWords,
  checkValue,
  typeCheck,
} from '../shared/validation/validators.js';
import type { Vocab } from '../text/vocab.js';
import { NUMERIC_TYPES, isNumericType, type NumericType } from '../text/numeric-types.js';
import {
  NORMALIZATION_FORMS,
  SEGMENTATION_MODES,
  type NormalizationForm,
  type SegmentationMode,
} from '../text/modes.js';
import { defineSignature, optional, required } from './signature.js';
import {
  checkFreqRange,
  checkMaxBytesPerToken,
  checkOptionalPositiveInteger,
  checkOptionalText,
  checkPadShape,
  checkPadWidth,
  checkRequiredText,
  checkSpecialTokens,
  checkVocab,
  checkWordDict,
  isPresent,
  normalizeColumns,
  normalizeGramSizes,
  type FreqRange,
  type PadSpec,
  type WordDict,
} from './checks.js';
import type { ArgumentBundle, Contract, Optional } from './types.js';

// =============================================================================
// Argument Types
// =============================================================================

export interface LookupArgs {
  vocab: Vocab;
  unknownToken: Optional<string>;
}

export interface VocabFromFileArgs {
  filePath: string;
  delimiter: string;
  vocabSize: Optional<number>;
  specialTokens: string[] | undefined;
  specialFirst: boolean;
}

export interface VocabFromListArgs {
  wordList: string[];
  specialTokens: string[] | undefined;
  specialFirst: boolean;
}

export interface VocabFromDictArgs {
  wordDict: WordDict;
}

export interface VocabFromDatasetArgs {
  dataset: unknown;
  columns: string[] | undefined;
  freqRange: Optional<FreqRange>;
  topK: Optional<number>;
  specialTokens: string[] | undefined;
  specialFirst: boolean;
}

export interface JiebaInitArgs {
  hmmPath: string;
  mpPath: string;
  mode: SegmentationMode;
  withOffsets: boolean;
}

export interface JiebaAddWordArgs {
  word: string;
  freq: Optional<number>;
}

export interface JiebaAddDictArgs {
  userDict: unknown;
}

export interface OffsetsArgs {
  withOffsets: boolean;
}

export interface UnicodeScriptArgs {
  keepWhitespace: boolean;
  withOffsets: boolean;
}

export interface WordpieceArgs {
  vocab: Vocab;
  suffixIndicator: string;
  maxBytesPerToken: number;
  unknownToken: string;
  withOffsets: boolean;
}

export interface RegexArgs {
  delimPattern: string;
  keepDelimPattern: string;
  withOffsets: boolean;
}

export interface BasicArgs {
  lowerCase: boolean;
  keepWhitespace: boolean;
  normalizationForm: NormalizationForm;
  preserveUnusedToken: boolean;
  withOffsets: boolean;
}

export type BertArgs = WordpieceArgs & BasicArgs;

export interface NgramArgs {
  n: number[];
  leftPad: PadSpec;
  rightPad: PadSpec;
  separator: string;
}

export interface ToNumberArgs {
  dataType: NumericType;
}

export interface CustomTokenizerArgs {
  tokenizer: (...args: never[]) => unknown;
}

export interface TruncateSequencePairArgs {
  maxLength: unknown;
}

export interface DictMergeArgs {
  other: unknown;
}

/**
 * Operation name -> validated argument type
 */
export interface OperationArgs {
  'lookup': LookupArgs;
  'vocab.fromFile': VocabFromFileArgs;
  'vocab.fromList': VocabFromListArgs;
  'vocab.fromDict': VocabFromDictArgs;
  'vocab.fromDataset': VocabFromDatasetArgs;
  'jieba.init': JiebaInitArgs;
  'jieba.addWord': JiebaAddWordArgs;
  'jieba.addDict': JiebaAddDictArgs;
  'unicodeChar': OffsetsArgs;
  'whitespace': OffsetsArgs;
  'unicodeScript': UnicodeScriptArgs;
  'wordpiece': WordpieceArgs;
  'regex': RegexArgs;
  'basic': BasicArgs;
  'bert': BertArgs;
  'ngram': NgramArgs;
  'toNumber': ToNumberArgs;
  'customTokenizer': CustomTokenizerArgs;
  'truncateSequencePair': TruncateSequencePairArgs;
  'dict.merge': DictMergeArgs;
}

export type OperationName = keyof OperationArgs;

// =============================================================================
// Defaults
// =============================================================================

const NO_PAD: PadSpec = Object.freeze(['', 0] as const);
const DEFAULT_SUFFIX_INDICATOR = '##';
const DEFAULT_UNKNOWN_TOKEN = '[UNK]';
const DEFAULT_MAX_BYTES_PER_TOKEN = 100;

// =============================================================================
// Shared predicate groups
// =============================================================================

function checkWordpieceFields(bundle: ArgumentBundle): WordpieceArgs {
  const { vocab, suffixIndicator, maxBytesPerToken, unknownToken, withOffsets } = bundle;

  checkVocab(vocab);
  typeCheck(suffixIndicator, ['string'], 'suffixIndicator');
  typeCheck(unknownToken, ['string'], 'unknownToken');
  typeCheck(withOffsets, ['boolean'], 'withOffsets');
  checkMaxBytesPerToken(maxBytesPerToken);

  return { vocab, suffixIndicator, maxBytesPerToken, unknownToken, withOffsets };
}

function checkBasicFields(bundle: ArgumentBundle): BasicArgs {
  const { lowerCase, keepWhitespace, normalizationForm, preserveUnusedToken, withOffsets } = bundle;

  typeCheck(lowerCase, ['boolean'], 'lowerCase');
  typeCheck(keepWhitespace, ['boolean'], 'keepWhitespace');
  checkOneOf(normalizationForm, NORMALIZATION_FORMS, 'normalizationForm');
  typeCheck(preserveUnusedToken, ['boolean'], 'preserveUnusedToken');
  typeCheck(withOffsets, ['boolean'], 'withOffsets');

  return { lowerCase, keepWhitespace, normalizationForm, preserveUnusedToken, withOffsets };
}

function offsetsContract(operation: 'unicodeChar' | 'whitespace', description: string): Contract<OffsetsArgs> {
  return {
    operation,
    description,
    signature: defineSignature(optional('withOffsets', false)),
    check: ({ withOffsets }) => {
      typeCheck(withOffsets, ['boolean'], 'withOffsets');
      return { withOffsets };
    },
  };
}

// =============================================================================
// Contracts
// =============================================================================

export const CONTRACTS: { readonly [K in OperationName]: Contract<OperationArgs[K]> } = {
  'lookup': {
    operation: 'lookup',
    description: 'Map tokens to ids through a vocabulary',
    signature: defineSignature(required('vocab'), optional('unknownToken')),
    check: ({ vocab, unknownToken }) => {
      checkOptionalText(unknownToken, 'unknownToken');
      checkVocab(vocab);
      return { vocab, unknownToken };
    },
  },

  'vocab.fromFile': {
    operation: 'vocab.fromFile',
    description: 'Build a vocabulary from a word file',
    signature: defineSignature(
      required('filePath'),
      optional('delimiter', ''),
      optional('vocabSize'),
      optional('specialTokens'),
      optional('specialFirst', true)
    ),
    check: ({ filePath, delimiter, vocabSize, specialTokens, specialFirst }) => {
      const tokens = checkSpecialTokens(specialTokens);
      typeCheck(filePath, ['string'], 'filePath');
      typeCheck(delimiter, ['string'], 'delimiter');
      let size: number | undefined;
      if (isPresent(vocabSize)) {
        typeCheck(vocabSize, ['integer'], 'vocabSize');
        checkValue(vocabSize, [UNBOUNDED_VOCAB_SIZE, INT32_MAX], 'vocabSize');
        size = vocabSize;
      }
      typeCheck(specialFirst, ['boolean'], 'specialFirst');
      return {
        filePath,
        delimiter,
        vocabSize: size,
        specialTokens: tokens,
        specialFirst,
      };
    },
  },

  'vocab.fromList': {
    operation: 'vocab.fromList',
    description: 'Build a vocabulary from a list of words',
    signature: defineSignature(
      required('wordList'),
      optional('specialTokens'),
      optional('specialFirst', true)
    ),
    check: ({ wordList, specialTokens, specialFirst }) => {
      const words = checkUniqueListOfWords(wordList, 'wordList');
      const tokens = checkSpecialTokens(specialTokens);
      if (tokens) {
        const wordSet = new Set(words);
        const overlap = tokens.filter((token) => wordSet.has(token));
        if (overlap.length > 0) {
          throw new ValueViolation(
            'specialTokens',
            overlap,
            `specialTokens and wordList contain duplicate words: ${describeValue(new Set(overlap))}`
          );
        }
      }
      typeCheck(specialFirst, ['boolean'], 'specialFirst');
      return { wordList: words, specialTokens: tokens, specialFirst };
    },
  },

  'vocab.fromDict': {
    operation: 'vocab.fromDict',
    description: 'Build a vocabulary from a word -> id table',
    signature: defineSignature(required('wordDict')),
    check: ({ wordDict }) => {
      checkWordDict(wordDict);
      return { wordDict };
    },
  },

  'vocab.fromDataset': {
    operation: 'vocab.fromDataset',
    description: 'Build a vocabulary from the words of a dataset',
    signature: defineSignature(
      required('dataset'),
      optional('columns'),
      optional('freqRange'),
      optional('topK'),
      optional('specialTokens'),
      optional('specialFirst', true)
    ),
    check: ({ dataset, columns, freqRange, topK, specialTokens, specialFirst }) => {
      const columnNames = normalizeColumns(columns);
      checkFreqRange(freqRange);
      checkOptionalPositiveInteger(topK, 'topK');
      typeCheck(specialFirst, ['boolean'], 'specialFirst');
      const tokens = checkSpecialTokens(specialTokens);
      return {
        dataset,
        columns: columnNames,
        freqRange,
        topK,
        specialTokens: tokens,
        specialFirst,
      };
    },
  },

  'jieba.init': {
    operation: 'jieba.init',
    description: 'Initialize the dictionary-based segmenter',
    signature: defineSignature(
      required('hmmPath'),
      required('mpPath'),
      optional('mode', 'mix'),
      optional('withOffsets', false)
    ),
    check: ({ hmmPath, mpPath, mode, withOffsets }) => {
      checkRequiredText(hmmPath, 'hmmPath');
      checkRequiredText(mpPath, 'mpPath');
      checkOneOf(mode, SEGMENTATION_MODES, 'mode');
      typeCheck(withOffsets, ['boolean'], 'withOffsets');
      return { hmmPath, mpPath, mode, withOffsets };
    },
  },

  'jieba.addWord': {
    operation: 'jieba.addWord',
    description: 'Add a word to the segmenter dictionary',
    signature: defineSignature(required('word'), optional('freq')),
    check: ({ word, freq }) => {
      checkRequiredText(word, 'word');
      let frequency: number | undefined;
      if (isPresent(freq)) {
        checkUint32(freq, 'freq');
        frequency = freq;
      }
      return { word, freq: frequency };
    },
  },

  'jieba.addDict': {
    operation: 'jieba.addDict',
    description: 'Merge a user dictionary into the segmenter',
    signature: defineSignature(required('userDict')),
    check: ({ userDict }) => ({ userDict }),
  },

  'unicodeChar': offsetsContract('unicodeChar', 'Split text into unicode characters'),

  'whitespace': offsetsContract('whitespace', 'Split text on whitespace'),

  'unicodeScript': {
    operation: 'unicodeScript',
    description: 'Split text on unicode script boundaries',
    signature: defineSignature(optional('keepWhitespace', false), optional('withOffsets', false)),
    check: ({ keepWhitespace, withOffsets }) => {
      typeCheck(keepWhitespace, ['boolean'], 'keepWhitespace');
      typeCheck(withOffsets, ['boolean'], 'withOffsets');
      return { keepWhitespace, withOffsets };
    },
  },

  'wordpiece': {
    operation: 'wordpiece',
    description: 'Split words into vocabulary sub-words',
    signature: defineSignature(
      required('vocab'),
      optional('suffixIndicator', DEFAULT_SUFFIX_INDICATOR),
      optional('maxBytesPerToken', DEFAULT_MAX_BYTES_PER_TOKEN),
      optional('unknownToken', DEFAULT_UNKNOWN_TOKEN),
      optional('withOffsets', false)
    ),
    check: checkWordpieceFields,
  },

  'regex': {
    operation: 'regex',
    description: 'Split text on a delimiter pattern',
    signature: defineSignature(
      required('delimPattern'),
      optional('keepDelimPattern', ''),
      optional('withOffsets', false)
    ),
    check: ({ delimPattern, keepDelimPattern, withOffsets }) => {
      checkRequiredText(delimPattern, 'delimPattern');
      typeCheck(keepDelimPattern, ['string'], 'keepDelimPattern');
      typeCheck(withOffsets, ['boolean'], 'withOffsets');
      return { delimPattern, keepDelimPattern, withOffsets };
    },
  },

  'basic': {
    operation: 'basic',
    description: 'Normalize, lower-case and split text',
    signature: defineSignature(
      optional('lowerCase', false),
      optional('keepWhitespace', false),
      optional('normalizationForm', 'none'),
      optional('preserveUnusedToken', true),
      optional('withOffsets', false)
    ),
    check: checkBasicFields,
  },

  'bert': {
    operation: 'bert',
    description: 'Basic tokenization followed by word-piece splitting',
    signature: defineSignature(
      required('vocab'),
      optional('suffixIndicator', DEFAULT_SUFFIX_INDICATOR),
      optional('maxBytesPerToken', DEFAULT_MAX_BYTES_PER_TOKEN),
      optional('unknownToken', DEFAULT_UNKNOWN_TOKEN),
      optional('lowerCase', false),
      optional('keepWhitespace', false),
      optional('normalizationForm', 'none'),
      optional('preserveUnusedToken', true),
      optional('withOffsets', false)
    ),
    // Checked in declaration order
    check: ({
      vocab,
      suffixIndicator,
      maxBytesPerToken,
      unknownToken,
      lowerCase,
      keepWhitespace,
      normalizationForm,
      preserveUnusedToken,
      withOffsets,
    }) => {
      checkVocab(vocab);
      typeCheck(suffixIndicator, ['string'], 'suffixIndicator');
      checkMaxBytesPerToken(maxBytesPerToken);
      typeCheck(unknownToken, ['string'], 'unknownToken');
      typeCheck(lowerCase, ['boolean'], 'lowerCase');
      typeCheck(keepWhitespace, ['boolean'], 'keepWhitespace');
      checkOneOf(normalizationForm, NORMALIZATION_FORMS, 'normalizationForm');
      typeCheck(preserveUnusedToken, ['boolean'], 'preserveUnusedToken');
      typeCheck(withOffsets, ['boolean'], 'withOffsets');

      return {
        vocab,
        suffixIndicator,
        maxBytesPerToken,
        unknownToken,
        lowerCase,
        keepWhitespace,
        normalizationForm,
        preserveUnusedToken,
        withOffsets,
      };
    },
  },

  'ngram': {
    operation: 'ngram',
    description: 'Generate n-grams from a token sequence',
    signature: defineSignature(
      required('n'),
      optional('leftPad', NO_PAD),
      optional('rightPad', NO_PAD),
      optional('separator', ' ')
    ),
    check: ({ n, leftPad, rightPad, separator }) => {
      const grams = normalizeGramSizes(n);
      checkPadShape(leftPad, 'leftPad');
      checkPadShape(rightPad, 'rightPad');
      checkPadWidth(leftPad, 'leftPad');
      checkPadWidth(rightPad, 'rightPad');
      typeCheck(separator, ['string'], 'separator');
      return { n: grams, leftPad, rightPad, separator };
    },
  },

  'toNumber': {
    operation: 'toNumber',
    description: 'Convert string tokens to a numeric type',
    signature: defineSignature(required('dataType')),
    check: ({ dataType }) => {
      typeCheck(dataType, ['string'], 'dataType');
      if (!isNumericType(dataType)) {
        throw new TypeViolation(
          'dataType',
          `numeric data type (${NUMERIC_TYPES.join(', ')})`,
          describeValue(dataType),
          dataType
        );
      }
      return { dataType };
    },
  },

  'customTokenizer': {
    operation: 'customTokenizer',
    description: 'Tokenize with a caller-supplied function',
    signature: defineSignature(required('tokenizer')),
    check: ({ tokenizer }) => {
      checkCallable(tokenizer, 'tokenizer');
      return { tokenizer };
    },
  },

  'truncateSequencePair': {
    operation: 'truncateSequencePair',
    description: 'Truncate a pair of sequences to a combined length',
    signature: defineSignature(required('maxLength')),
    check: ({ maxLength }) => ({ maxLength }),
  },

  'dict.merge': {
    operation: 'dict.merge',
    description: 'Merge another dictionary into this one',
    signature: defineSignature(required('other')),
    check: ({ other }) => ({ other }),
  },
};

export const OPERATION_NAMES = Object.keys(CONTRACTS).filter(isOperationName);

export function isOperationName(name: string): name is OperationName {
  return Object.hasOwn(CONTRACTS, name);
}
