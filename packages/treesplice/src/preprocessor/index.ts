export { Preprocessor } from "./preprocessor.js";
export type { PreprocessorConfig, PreprocessResult } from "./preprocessor.js";
export { DEFAULT_PREPROCESSOR_OPTIONS, resolvePreprocessorOptions } from "./options.js";
export type { PreprocessorOptions, ResolvedPreprocessorOptions } from "./options.js";
