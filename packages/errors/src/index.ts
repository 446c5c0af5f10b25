export { AppError, rootCauseMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  InvalidConfigurationError,
  EmptyInputError,
  ValidationError,
  NotFoundError,
  UnsupportedMediaTypeError,
  PayloadTooLargeError,
  ExtractionFailedError,
  GenerationFailedError,
  SummarizationFailedError,
  MergeFailedError,
  HighlightExtractionFailedError,
} from "./errors.js";

export { withRetry, calculateDelay } from "./retry.js";
export type { AttemptOutcome, RetryResult, RetryEvent, RetryOptions } from "./retry.js";
