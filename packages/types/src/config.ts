import type { ChunkingConfig } from "./chunk.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: LogLevel;
  ollama: OllamaConfig;
  chunking: ChunkingConfig;
  generation: GenerationConfig;
  summarizer: SummarizerConfig;
  upload: UploadConfig;
}

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface GenerationConfig {
  temperature: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface SummarizerConfig {
  /** Number of chunks summarized in parallel. 1 keeps the calls sequential. */
  concurrency: number;
}

export interface UploadConfig {
  minTextLength: number;
  maxUploadMb: number;
  /** Lower-case file extensions accepted by multipart uploads, without the dot. */
  allowedExtensions: string[];
}
