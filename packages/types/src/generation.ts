export interface SamplingOptions {
  temperature: number;
  topP: number;
  topK: number;
  repeatPenalty: number;
  /** Upper bound on generated tokens. */
  maxOutputTokens: number;
}

export interface GenerateOptions {
  /** System instruction sent alongside the prompt. */
  system?: string;
  /** Overrides the client's configured retry count for this call. */
  maxRetries?: number;
}

export type GenerationFailureKind = "timeout" | "connection" | "http_status" | "empty_response";

export interface GenerationFailure {
  kind: GenerationFailureKind;
  message: string;
  /** HTTP status, present when kind is "http_status". */
  status?: number;
}
