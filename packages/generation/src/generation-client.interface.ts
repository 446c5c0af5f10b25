import type { GenerateOptions } from "@docdigest/types";

export interface IGenerationClient {
  /** Model identifier sent with every request. */
  readonly model: string;
  /** Base URL of the generation endpoint. */
  readonly baseUrl: string;

  /**
   * Generate text for `prompt`. Resolves with trimmed, non-empty text or
   * rejects with a `GenerationFailedError`.
   */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  healthCheck(): Promise<boolean>;
  /** Names of the models the endpoint serves. Empty on any failure. */
  listModels(): Promise<string[]>;
}
