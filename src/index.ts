/**
 * fxlit Module
 * Exports the extraction API, options and error types
 */

export { extract, extractStream } from './extract.js';
export {
  createLineReader,
  type LineReader,
  type OutputSink,
} from './scanner/state.js';
export {
  DEFAULT_FUNCTION_NAME,
  DEFAULT_SOURCE_PATH,
  type ExtractOptions,
  type LiteralEvent,
  type ObservabilityCallbacks,
  resolveOptions,
  type ResolvedExtractOptions,
} from './options.js';
export type { SourceLocation } from './source-location.js';
export {
  createError,
  EarlyEndError,
  FxError,
  type FxErrorData,
  ParsingError,
} from './error-classes.js';
export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  renderMessage,
} from './error-registry.js';
