import type { GenerationFailure } from "@docdigest/types";
import { AppError, rootCauseMessage } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
}

export class InvalidConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_CONFIGURATION",
      isOperational: false,
      details: options?.details,
    });
  }
}

export class EmptyInputError extends AppError {
  constructor(message = "Document produced no text to summarize") {
    super({ message, statusCode: 400, code: "EMPTY_INPUT" });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", details: { fields } });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super({ message, statusCode: 404, code: "NOT_FOUND" });
  }
}

export class UnsupportedMediaTypeError extends AppError {
  public readonly mimeType: string;

  constructor(mimeType: string, supported: readonly string[]) {
    super({
      message: `Unsupported content type "${mimeType}". Supported: ${supported.join(", ")}`,
      statusCode: 415,
      code: "UNSUPPORTED_MEDIA_TYPE",
    });
    this.mimeType = mimeType;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message = "Request body too large") {
    super({ message, statusCode: 413, code: "PAYLOAD_TOO_LARGE" });
  }
}

/** A supported document could not be turned into text (corrupt or encrypted file). */
export class ExtractionFailedError extends AppError {
  constructor(cause: unknown) {
    super({
      message: `Text extraction failed: ${rootCauseMessage(cause)}`,
      statusCode: 400,
      code: "EXTRACTION_FAILED",
      cause,
    });
  }
}

/**
 * The generation endpoint could not produce text within the retry budget,
 * or answered with a status that is not worth retrying.
 */
export class GenerationFailedError extends AppError {
  public readonly failure: GenerationFailure;
  public readonly attempts: number;

  constructor(failure: GenerationFailure, attempts: number) {
    super({
      message: `Generation failed after ${String(attempts)} attempt(s): ${failure.message}`,
      statusCode: 502,
      code: "GENERATION_FAILED",
      details: { kind: failure.kind, status: failure.status, attempts },
    });
    this.failure = failure;
    this.attempts = attempts;
  }
}

export class SummarizationFailedError extends AppError {
  public readonly chunkIndex: number;

  constructor(chunkIndex: number, cause: unknown) {
    super({
      message: `Summarizing chunk ${String(chunkIndex + 1)} failed: ${rootCauseMessage(cause)}`,
      statusCode: 502,
      code: "SUMMARIZATION_FAILED",
      details: { chunkIndex },
      cause,
    });
    this.chunkIndex = chunkIndex;
  }
}

export class MergeFailedError extends AppError {
  constructor(cause: unknown) {
    super({
      message: `Merging chunk summaries failed: ${rootCauseMessage(cause)}`,
      statusCode: 502,
      code: "MERGE_FAILED",
      cause,
    });
  }
}

export class HighlightExtractionFailedError extends AppError {
  constructor(cause: unknown) {
    super({
      message: `Extracting highlights failed: ${rootCauseMessage(cause)}`,
      statusCode: 502,
      code: "HIGHLIGHT_EXTRACTION_FAILED",
      cause,
    });
  }
}
