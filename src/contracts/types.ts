/**
 * Argument contract types
 */

/**
 * One declared parameter of an operation
 */
export interface ParameterSpec {
  readonly name: string;
  /** Required parameters have no default */
  readonly required: boolean;
  readonly default?: unknown;
}

/**
 * Ordered, immutable parameter list of an operation
 */
export type OperationSignature = readonly ParameterSpec[];

/**
 * Keyword arguments as supplied by a caller
 */
export type RawKeywords = Readonly<Record<string, unknown>>;

/**
 * Parameter name -> supplied or defaulted value, for a single call
 */
export type ArgumentBundle = Readonly<Record<string, unknown>>;

/**
 * A value that may be absent
 */
export type Optional<T> = T | null | undefined;

/**
 * Validation predicate set bound to one operation.
 * `check` throws a Violation on the first unmet predicate and otherwise
 * returns the bundle narrowed to the operation's argument type.
 */
export interface Contract<TArgs> {
  readonly operation: string;
  readonly description: string;
  readonly signature: OperationSignature;
  check(bundle: ArgumentBundle): TArgs;
}
