import type { ChunkSummary, SummarizationStage, SummaryResult } from "@docdigest/types";
import type { IChunker } from "@docdigest/chunker";
import { computeChunkStats } from "@docdigest/chunker";
import type { IGenerationClient } from "@docdigest/generation";
import type { Logger } from "@docdigest/logger";
import {
  EmptyInputError,
  HighlightExtractionFailedError,
  MergeFailedError,
  SummarizationFailedError,
} from "@docdigest/errors";
import { mapWithConcurrencyLimit } from "./concurrency.js";
import { parseHighlights } from "./highlight-parser.js";
import {
  SYSTEM_MESSAGE,
  chunkPrompt,
  highlightPrompt,
  mergePrompt,
  numberSummaries,
} from "./prompts.js";

export interface SummarizerDependencies {
  chunker: IChunker;
  generator: IGenerationClient;
  logger: Logger;
  /** Chunks summarized in parallel. Default: 1 (sequential). */
  concurrency?: number;
  onStageChange?: (stage: SummarizationStage) => void;
  onChunkSummarized?: (summary: ChunkSummary, totalChunks: number) => void;
}

/**
 * Hierarchical summarization: Chunk -> Summarize each chunk -> Merge -> Extract highlights
 *
 * Each call owns its chunks and intermediate summaries; only the injected
 * dependencies are shared between concurrent calls.
 */
export class Summarizer {
  private readonly chunker: IChunker;
  private readonly generator: IGenerationClient;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly onStageChange?: (stage: SummarizationStage) => void;
  private readonly onChunkSummarized?: (summary: ChunkSummary, totalChunks: number) => void;

  constructor(deps: SummarizerDependencies) {
    this.chunker = deps.chunker;
    this.generator = deps.generator;
    this.logger = deps.logger.child({ component: "summarizer" });
    this.concurrency = deps.concurrency ?? 1;
    this.onStageChange = deps.onStageChange;
    this.onChunkSummarized = deps.onChunkSummarized;
  }

  async summarize(text: string): Promise<SummaryResult> {
    const startTime = Date.now();
    let stage: SummarizationStage = "chunking";

    const enter = (next: SummarizationStage): void => {
      stage = next;
      this.logger.debug({ stage }, "Entering stage");
      this.onStageChange?.(stage);
    };

    try {
      // Phase 1: Chunk
      enter("chunking");
      const chunks = this.chunker.chunk(text);
      if (chunks.length === 0) {
        throw new EmptyInputError();
      }
      this.logger.info(computeChunkStats(text, chunks, this.chunker.config), "Text chunked");

      // Phase 2: Summarize each chunk, reassembled in chunk order
      enter("summarizing_chunks");
      const chunkSummaries = await mapWithConcurrencyLimit(
        chunks,
        async (chunk): Promise<ChunkSummary> => {
          this.logger.info(
            { chunkIndex: chunk.index, totalChunks: chunks.length },
            `Summarizing chunk ${String(chunk.index + 1)}/${String(chunks.length)}`,
          );
          try {
            const summary: ChunkSummary = {
              index: chunk.index,
              text: await this.generator.generate(chunkPrompt(chunk.content)),
            };
            this.onChunkSummarized?.(summary, chunks.length);
            return summary;
          } catch (error: unknown) {
            throw new SummarizationFailedError(chunk.index, error);
          }
        },
        this.concurrency,
      );

      // Phase 3: Merge
      enter("merging");
      const detailedSummary = await this.combineSummaries(chunkSummaries);

      // Phase 4: Highlights
      enter("extracting_highlights");
      const highlights = await this.extractHighlights(detailedSummary);

      enter("done");
      this.logger.info(
        {
          chunkCount: chunks.length,
          highlightCount: highlights.length,
          durationMs: Date.now() - startTime,
        },
        "Summarization complete",
      );

      return { highlights, detailedSummary, chunkCount: chunks.length };
    } catch (error: unknown) {
      this.logger.error({ err: error, stage }, "Summarization failed");
      this.onStageChange?.("failed");
      throw error;
    }
  }

  private async combineSummaries(summaries: readonly ChunkSummary[]): Promise<string> {
    const ordered = [...summaries].sort((a, b) => a.index - b.index).map((s) => s.text);

    if (ordered.length === 1 && ordered[0] !== undefined) {
      return ordered[0];
    }

    this.logger.info({ summaryCount: ordered.length }, "Combining chunk summaries");
    try {
      return await this.generator.generate(mergePrompt(numberSummaries(ordered)), {
        system: SYSTEM_MESSAGE,
      });
    } catch (error: unknown) {
      throw new MergeFailedError(error);
    }
  }

  private async extractHighlights(summary: string): Promise<string[]> {
    this.logger.info("Extracting key points");
    let raw: string;
    try {
      raw = await this.generator.generate(highlightPrompt(summary), { system: SYSTEM_MESSAGE });
    } catch (error: unknown) {
      throw new HighlightExtractionFailedError(error);
    }

    const highlights = parseHighlights(raw);
    if (highlights.length === 0) {
      this.logger.warn({ responseChars: raw.length }, "Highlight response contained no usable lines");
    }
    return highlights;
  }
}
