export type { Chunk, ChunkingConfig, ChunkStats } from "./chunk.js";
export type {
  SamplingOptions,
  GenerateOptions,
  GenerationFailure,
  GenerationFailureKind,
} from "./generation.js";
export type { SummarizationStage, ChunkSummary, SummaryResult } from "./summary.js";
export type { ParseResult } from "./parse.js";
export type {
  AppConfig,
  LogLevel,
  OllamaConfig,
  GenerationConfig,
  SummarizerConfig,
  UploadConfig,
} from "./config.js";
export type {
  ApiResponse,
  ApiError,
  SummarizeResponseData,
  HealthResponse,
} from "./api.js";
