/**
 * text-contracts
 *
 * Argument contracts for text-processing operations.
 */

export * from './contracts/index.js';
export * from './shared/errors/index.js';
export * from './shared/validation/index.js';
export { INT32_MAX, UINT32_MAX, UNBOUNDED_VOCAB_SIZE } from './shared/config/limits.js';
export {
  configureLogger,
  configureLoggerFromEnv,
  type LoggerConfig,
  type LogLevel,
} from './shared/logging/structured.js';
export { Vocab } from './text/vocab.js';
export { NUMERIC_TYPES, isNumericType, type NumericType } from './text/numeric-types.js';
export {
  NORMALIZATION_FORMS,
  SEGMENTATION_MODES,
  type NormalizationForm,
  type SegmentationMode,
} from './text/modes.js';
export { buildVocabFromDict, buildVocabFromList, createLookup } from './text/builders.js';
