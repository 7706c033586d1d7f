/**
 * Closed option sets for tokenizer parameters
 */

/** Segmentation algorithm of the dictionary-based segmenter */
export const SEGMENTATION_MODES = ['mp', 'hmm', 'mix'] as const;
export type SegmentationMode = (typeof SEGMENTATION_MODES)[number];

/** Unicode normalization applied before basic tokenization */
export const NORMALIZATION_FORMS = ['none', 'nfc', 'nfkc', 'nfd', 'nfkd'] as const;
export type NormalizationForm = (typeof NORMALIZATION_FORMS)[number];
