/**
 * Numeric type identifiers accepted by numeric conversion
 */
export const NUMERIC_TYPES = [
  'int8',
  'int16',
  'int32',
  'int64',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'float16',
  'float32',
  'float64',
] as const;

export type NumericType = (typeof NUMERIC_TYPES)[number];

export function isNumericType(value: unknown): value is NumericType {
  return NUMERIC_TYPES.some((type) => type === value);
}
