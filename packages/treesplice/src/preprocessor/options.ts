export type PreprocessorOptions = {
  /**
   * Deepest include chain allowed below the root. `0` allows no includes.
   * @default 100
   */
  maxIncludeDepth?: number;
  /**
   * Keep resolving after the first error so every problem is reported.
   * @default false
   */
  continueOnError?: boolean;
  /** Aborts resolution and merging with the signal's reason */
  signal?: AbortSignal;
};

export type ResolvedPreprocessorOptions = {
  readonly maxIncludeDepth: number;
  readonly continueOnError: boolean;
  readonly signal: AbortSignal | undefined;
};

export const DEFAULT_PREPROCESSOR_OPTIONS: ResolvedPreprocessorOptions = Object.freeze({
  maxIncludeDepth: 100,
  continueOnError: false,
  signal: undefined,
});

export function resolvePreprocessorOptions(options: PreprocessorOptions = {}): ResolvedPreprocessorOptions {
  const resolved: ResolvedPreprocessorOptions = {
    maxIncludeDepth: options.maxIncludeDepth ?? DEFAULT_PREPROCESSOR_OPTIONS.maxIncludeDepth,
    continueOnError: options.continueOnError ?? DEFAULT_PREPROCESSOR_OPTIONS.continueOnError,
    signal: options.signal,
  };
  if (!Number.isInteger(resolved.maxIncludeDepth) || resolved.maxIncludeDepth < 0) {
    throw new RangeError(`maxIncludeDepth must be a non-negative integer, got ${resolved.maxIncludeDepth}`);
  }
  return resolved;
}
