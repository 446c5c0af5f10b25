import { z } from "zod";
import type { GenerateOptions, GenerationFailure, SamplingOptions } from "@docdigest/types";
import { GenerationFailedError, withRetry } from "@docdigest/errors";
import type { AttemptOutcome } from "@docdigest/errors";
import type { Logger } from "@docdigest/logger";
import type { IGenerationClient } from "./generation-client.interface.js";

const DEFAULT_TIMEOUT_MS = 120_000;
const PROBE_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_RETRIES = 1;

export const DEFAULT_SAMPLING: SamplingOptions = {
  temperature: 0.7,
  topP: 0.9,
  topK: 40,
  repeatPenalty: 1.1,
  maxOutputTokens: 512,
};

export interface OllamaClientConfig {
  baseUrl: string;
  model: string;
  logger: Logger;
  /** Per-request timeout for generation calls. Default: 120000 */
  timeoutMs?: number;
  /** Overrides for the fixed sampling parameters. */
  sampling?: Partial<SamplingOptions>;
  /** Retries after the first attempt when a call does not pass one. Default: 1 */
  maxRetries?: number;
  /** Backoff base between attempts. 0 retries immediately. Default: 0 */
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
}

/** Body of `POST /api/generate`. */
export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    top_p: number;
    top_k: number;
    repeat_penalty: number;
    num_predict: number;
  };
  system?: string;
}

const generateResponseSchema = z.object({
  response: z.string().optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export function buildGenerateRequest(
  model: string,
  prompt: string,
  sampling: SamplingOptions,
  system?: string,
): OllamaGenerateRequest {
  return {
    model,
    prompt,
    stream: false,
    options: {
      temperature: sampling.temperature,
      top_p: sampling.topP,
      top_k: sampling.topK,
      repeat_penalty: sampling.repeatPenalty,
      num_predict: sampling.maxOutputTokens,
    },
    ...(system ? { system } : {}),
  };
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

function describeConnectionError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `Connection error: ${error.message}${cause}`;
  }
  return `Connection error: ${String(error)}`;
}

function timeoutError(timeoutMs: number): Error {
  const error = new Error(`Request timed out after ${String(timeoutMs)}ms`);
  error.name = "TimeoutError";
  return error;
}

/**
 * Run one request/response exchange under a single deadline.
 * The signal stays armed until `exchange` settles, body reads included.
 */
async function withTimeout<T>(
  timeoutMs: number,
  exchange: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(timeoutError(timeoutMs)), timeoutMs);

  try {
    return await exchange(controller.signal);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Settle with `promise`, or reject with the abort reason once `signal` fires.
 * Covers body reads on responses whose stream ignores the request signal.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Client for Ollama's HTTP API (`/api/generate`, `/api/tags`).
 * Generation is non-streaming and retried with a bounded attempt budget.
 */
export class OllamaGenerationClient implements IGenerationClient {
  readonly model: string;
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly sampling: SamplingOptions;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly logger: Logger;

  constructor(config: OllamaClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.sampling = { ...DEFAULT_SAMPLING, ...config.sampling };
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 0;
    this.retryMaxDelayMs = config.retryMaxDelayMs ?? 10_000;
    this.logger = config.logger.child({ component: "ollama-client", model: this.model });
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const request = buildGenerateRequest(this.model, prompt, this.sampling, options?.system);
    const maxRetries = options?.maxRetries ?? this.maxRetries;
    const totalAttempts = maxRetries + 1;

    const result = await withRetry<string, GenerationFailure>(
      async (attemptNumber) => {
        this.logger.debug(
          { attempt: attemptNumber + 1, totalAttempts, promptChars: prompt.length },
          "Calling generation endpoint",
        );
        return this.attempt(request);
      },
      {
        maxRetries,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: this.retryMaxDelayMs,
        onRetry: ({ attempt, error, delayMs }) => {
          this.logger.warn(
            { attempt: attempt + 1, totalAttempts, kind: error.kind, status: error.status, delayMs },
            `Generation attempt failed: ${error.message}`,
          );
        },
      },
    );

    if (!result.ok) {
      this.logger.error(
        { attempts: result.attempts, kind: result.error.kind, status: result.error.status },
        `Generation failed: ${result.error.message}`,
      );
      throw new GenerationFailedError(result.error, result.attempts);
    }

    this.logger.debug(
      { attempts: result.attempts, chars: result.value.length },
      "Generation succeeded",
    );
    return result.value;
  }

  /**
   * One round trip to `/api/generate`, classified into a tagged outcome.
   * Every failure counts against the retry budget; none ends it early.
   */
  async attempt(request: OllamaGenerateRequest): Promise<AttemptOutcome<string, GenerationFailure>> {
    return withTimeout(this.timeoutMs, async (signal) => {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/api/generate`, {
          method: "POST",
          headers: { "Content-Type": "application/json", Accept: "application/json" },
          body: JSON.stringify(request),
          signal,
        });
      } catch (error: unknown) {
        return isTimeoutError(error) ? this.timedOut() : this.connectionFailed(error);
      }

      if (!response.ok) {
        await response.body?.cancel();
        return {
          kind: "retryable",
          error: {
            kind: "http_status",
            message: `HTTP error: ${String(response.status)}`,
            status: response.status,
          },
        };
      }

      let body: unknown;
      try {
        body = await untilAborted(response.json(), signal);
      } catch (error: unknown) {
        if (isTimeoutError(error)) {
          return this.timedOut();
        }
        return {
          kind: "retryable",
          error: { kind: "empty_response", message: "Malformed JSON in generation response" },
        };
      }

      const parsed = generateResponseSchema.safeParse(body);
      const text = parsed.success ? (parsed.data.response ?? "").trim() : "";
      if (!text) {
        return {
          kind: "retryable",
          error: { kind: "empty_response", message: "Empty response from generation endpoint" },
        };
      }

      return { kind: "success", value: text };
    });
  }

  private timedOut(): AttemptOutcome<string, GenerationFailure> {
    return {
      kind: "retryable",
      error: { kind: "timeout", message: `Request timed out after ${String(this.timeoutMs)}ms` },
    };
  }

  private connectionFailed(error: unknown): AttemptOutcome<string, GenerationFailure> {
    return { kind: "retryable", error: { kind: "connection", message: describeConnectionError(error) } };
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await withTimeout(PROBE_TIMEOUT_MS, async (signal) => {
        const response = await fetch(`${this.baseUrl}/api/tags`, { signal });
        await response.body?.cancel();
        return response.status === 200;
      });
    } catch (error: unknown) {
      this.logger.error({ err: error }, "Health check failed");
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      return await withTimeout(PROBE_TIMEOUT_MS, async (signal) => {
        const response = await fetch(`${this.baseUrl}/api/tags`, { signal });
        if (!response.ok) {
          await response.body?.cancel();
          throw new Error(`HTTP error: ${String(response.status)}`);
        }
        const data = tagsResponseSchema.parse(await untilAborted(response.json(), signal));
        return data.models.map((model) => model.name);
      });
    } catch (error: unknown) {
      this.logger.error({ err: error }, "Failed to list models");
      return [];
    }
  }
}
