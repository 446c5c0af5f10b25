import { describe, it, expect } from "vitest";
import { AppError, rootCauseMessage } from "./app-error.js";
import {
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

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("socket hang up");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });

  it("defaults isOperational to true and leaves cause unset", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new EmptyInputError())).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("rootCauseMessage", () => {
  it("returns the message of the innermost cause", () => {
    const inner = new Error("ECONNREFUSED");
    const middle = new Error("request failed", { cause: inner });
    const outer = new Error("stage failed", { cause: middle });

    expect(rootCauseMessage(outer)).toBe("ECONNREFUSED");
  });

  it("returns the error's own message when there is no cause", () => {
    expect(rootCauseMessage(new Error("alone"))).toBe("alone");
  });

  it("stringifies non-Error values", () => {
    expect(rootCauseMessage("boom")).toBe("boom");
    expect(rootCauseMessage(new Error("wrapped", { cause: 42 }))).toBe("42");
  });
});

describe("Error Subclasses", () => {
  it("InvalidConfigurationError is a non-operational 400", () => {
    const err = new InvalidConfigurationError("overlap too large");
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("INVALID_CONFIGURATION");
    expect(err.isOperational).toBe(false);
    expect(err.name).toBe("InvalidConfigurationError");
  });

  it("EmptyInputError has status 400 and EMPTY_INPUT code", () => {
    const err = new EmptyInputError();
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("EMPTY_INPUT");
    expect(err.message).toBe("Document produced no text to summarize");
  });

  it("ValidationError carries fields", () => {
    const err = new ValidationError("Validation failed", { content: "Required" });
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.fields).toEqual({ content: "Required" });
    expect(err.details).toEqual({ fields: { content: "Required" } });
  });

  it("NotFoundError has status 404", () => {
    const err = new NotFoundError();
    expect(err.statusCode).toBe(404);
    expect(err.message).toBe("Resource not found");
  });

  it("UnsupportedMediaTypeError lists supported types", () => {
    const err = new UnsupportedMediaTypeError("application/pdf", ["text/plain", "text/html"]);
    expect(err.statusCode).toBe(415);
    expect(err.mimeType).toBe("application/pdf");
    expect(err.message).toBe(
      'Unsupported content type "application/pdf". Supported: text/plain, text/html',
    );
  });

  it("PayloadTooLargeError has status 413", () => {
    const err = new PayloadTooLargeError("File too large. Maximum size: 20MB");
    expect(err.statusCode).toBe(413);
    expect(err.code).toBe("PAYLOAD_TOO_LARGE");
    expect(err.message).toBe("File too large. Maximum size: 20MB");
  });

  it("ExtractionFailedError is a 400 carrying the parser failure", () => {
    const cause = new Error("Invalid PDF structure.");
    const err = new ExtractionFailedError(cause);
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("EXTRACTION_FAILED");
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Text extraction failed: Invalid PDF structure.");
  });

  it("GenerationFailedError reports attempts and the last failure", () => {
    const err = new GenerationFailedError(
      { kind: "timeout", message: "Request timed out after 120000ms" },
      2,
    );
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("GENERATION_FAILED");
    expect(err.attempts).toBe(2);
    expect(err.failure.kind).toBe("timeout");
    expect(err.message).toBe(
      "Generation failed after 2 attempt(s): Request timed out after 120000ms",
    );
  });

  it("SummarizationFailedError names the 1-based chunk and wraps the cause", () => {
    const cause = new GenerationFailedError({ kind: "connection", message: "fetch failed" }, 1);
    const err = new SummarizationFailedError(2, cause);

    expect(err.chunkIndex).toBe(2);
    expect(err.cause).toBe(cause);
    expect(err.statusCode).toBe(502);
    expect(err.message).toBe(
      "Summarizing chunk 3 failed: Generation failed after 1 attempt(s): fetch failed",
    );
  });

  it("MergeFailedError and HighlightExtractionFailedError identify their stage", () => {
    const cause = new Error("HTTP 503");

    expect(new MergeFailedError(cause).code).toBe("MERGE_FAILED");
    expect(new MergeFailedError(cause).message).toBe("Merging chunk summaries failed: HTTP 503");
    expect(new HighlightExtractionFailedError(cause).code).toBe("HIGHLIGHT_EXTRACTION_FAILED");
    expect(new HighlightExtractionFailedError(cause).message).toBe(
      "Extracting highlights failed: HTTP 503",
    );
  });
});
