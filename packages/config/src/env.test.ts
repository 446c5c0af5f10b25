import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    PORT: "8080",
    LOG_LEVEL: "debug",
    OLLAMA_BASE_URL: "http://ollama.internal:11434/",
    OLLAMA_MODEL: "llama3.1:8b",
    OLLAMA_TIMEOUT_SECONDS: "60",
    CHUNK_SIZE: "2000",
    CHUNK_OVERLAP: "200",
    SUMMARY_TEMPERATURE: "0.3",
    GENERATION_MAX_RETRIES: "2",
    RETRY_BASE_DELAY_MS: "250",
    RETRY_MAX_DELAY_MS: "4000",
    SUMMARY_CONCURRENCY: "4",
    MIN_TEXT_LENGTH: "100",
    MAX_UPLOAD_MB: "10",
    ALLOWED_EXTENSIONS: " .PDF, txt ,,docx",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config).toEqual({
      nodeEnv: "test",
      port: 8080,
      logLevel: "debug",
      ollama: {
        baseUrl: "http://ollama.internal:11434",
        model: "llama3.1:8b",
        timeoutMs: 60_000,
      },
      chunking: { windowSize: 2000, overlap: 200 },
      generation: {
        temperature: 0.3,
        maxRetries: 2,
        retryBaseDelayMs: 250,
        retryMaxDelayMs: 4000,
      },
      summarizer: { concurrency: 4 },
      upload: { minTextLength: 100, maxUploadMb: 10, allowedExtensions: ["pdf", "txt", "docx"] },
    });
  });

  it("uses defaults for an empty environment", () => {
    const config = parseEnv({});

    expect(config.nodeEnv).toBe("development");
    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe("info");
    expect(config.ollama).toEqual({
      baseUrl: "http://localhost:11434",
      model: "gpt-oss:20b",
      timeoutMs: 120_000,
    });
    expect(config.chunking).toEqual({ windowSize: 3000, overlap: 300 });
    expect(config.generation).toEqual({
      temperature: 0.7,
      maxRetries: 1,
      retryBaseDelayMs: 500,
      retryMaxDelayMs: 8000,
    });
    expect(config.summarizer.concurrency).toBe(1);
    expect(config.upload).toEqual({
      minTextLength: 50,
      maxUploadMb: 20,
      allowedExtensions: ["pdf", "docx", "xlsx", "txt", "md", "csv", "html"],
    });
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "500", CHUNK_OVERLAP: "500" }))).toThrow(
      "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    );
  });

  it("rejects a non-URL OLLAMA_BASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ OLLAMA_BASE_URL: "localhost" }))).toThrow();
  });

  it("rejects a temperature outside 0-2", () => {
    expect(() => parseEnv(makeValidEnv({ SUMMARY_TEMPERATURE: "2.5" }))).toThrow();
  });

  it("rejects non-numeric and fractional integers", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "big" }))).toThrow();
    expect(() => parseEnv(makeValidEnv({ GENERATION_MAX_RETRIES: "1.5" }))).toThrow();
  });

  it("rejects a zero concurrency", () => {
    expect(() => parseEnv(makeValidEnv({ SUMMARY_CONCURRENCY: "0" }))).toThrow();
  });

  it("rejects an empty extension allow-list", () => {
    expect(() => parseEnv(makeValidEnv({ ALLOWED_EXTENSIONS: " , " }))).toThrow(
      "ALLOWED_EXTENSIONS must name at least one extension",
    );
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
