export {
  AnalysisAbortedError,
  AnalysisError,
  ChunkedAnalysisError,
  ConfigurationError,
  ModelCallError,
  SchemaValidationError,
  TransientCallError,
  classifyModelError,
  isRetryableModelError,
} from './analysis-error';
export type {
  AbortReason,
  ChunkFailure,
  ModelErrorClass,
  TransientReason,
} from './analysis-error';
