import { z } from "zod";
import type { AppConfig } from "@docdigest/types";

function intVar(fallback: string) {
  return z.string().default(fallback).transform(Number).pipe(z.number().int());
}

/**
 * Zod schema for the service's environment variables.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: intVar("8000").pipe(z.number().positive()),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Ollama ----------
    OLLAMA_BASE_URL: z
      .string()
      .url("OLLAMA_BASE_URL must be a URL")
      .default("http://localhost:11434")
      .transform((url) => url.replace(/\/+$/, "")),
    OLLAMA_MODEL: z.string().min(1, "OLLAMA_MODEL must not be empty").default("gpt-oss:20b"),
    OLLAMA_TIMEOUT_SECONDS: intVar("120").pipe(z.number().positive()),

    // ---------- Chunking ----------
    CHUNK_SIZE: intVar("3000").pipe(z.number().positive()),
    CHUNK_OVERLAP: intVar("300").pipe(z.number().nonnegative()),

    // ---------- Generation ----------
    SUMMARY_TEMPERATURE: z
      .string()
      .default("0.7")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),
    GENERATION_MAX_RETRIES: intVar("1").pipe(z.number().nonnegative()),
    RETRY_BASE_DELAY_MS: intVar("500").pipe(z.number().nonnegative()),
    RETRY_MAX_DELAY_MS: intVar("8000").pipe(z.number().nonnegative()),

    // ---------- Summarizer ----------
    SUMMARY_CONCURRENCY: intVar("1").pipe(z.number().positive()),

    // ---------- Uploads ----------
    MIN_TEXT_LENGTH: intVar("50").pipe(z.number().nonnegative()),
    MAX_UPLOAD_MB: intVar("20").pipe(z.number().positive()),
    ALLOWED_EXTENSIONS: z
      .string()
      .default("pdf,docx,xlsx,txt,md,csv,html")
      .transform((list) =>
        list
          .split(",")
          .map((ext) => ext.trim().replace(/^\./, "").toLowerCase())
          .filter((ext) => ext.length > 0),
      )
      .pipe(z.array(z.string()).min(1, "ALLOWED_EXTENSIONS must name at least one extension")),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL,
      model: parsed.OLLAMA_MODEL,
      timeoutMs: parsed.OLLAMA_TIMEOUT_SECONDS * 1_000,
    },

    chunking: {
      windowSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    generation: {
      temperature: parsed.SUMMARY_TEMPERATURE,
      maxRetries: parsed.GENERATION_MAX_RETRIES,
      retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },

    summarizer: {
      concurrency: parsed.SUMMARY_CONCURRENCY,
    },

    upload: {
      minTextLength: parsed.MIN_TEXT_LENGTH,
      maxUploadMb: parsed.MAX_UPLOAD_MB,
      allowedExtensions: parsed.ALLOWED_EXTENSIONS,
    },
  };
}
