import type { Chunk, ChunkingConfig, ChunkStats } from "@docdigest/types";
import { InvalidConfigurationError } from "@docdigest/errors";
import type { IChunker } from "./chunker.interface.js";

/** Markers that end a sentence or paragraph, searched for near the end of a window. */
const BOUNDARY_MARKERS = [". ", "? ", "! ", "\n\n"] as const;

/** How far back from the window end a natural break is searched for. */
export const BOUNDARY_SEARCH_CHARS = 200;

/**
 * Fixed-size character windows with overlap.
 * Windows end at the last sentence or paragraph break near their end when one
 * exists, and are hard-cut at `windowSize` otherwise.
 */
export class WindowChunker implements IChunker {
  readonly strategy = "window";
  readonly config: ChunkingConfig;

  constructor(config: ChunkingConfig) {
    const { windowSize, overlap } = config;

    if (!Number.isInteger(windowSize) || windowSize <= 0) {
      throw new InvalidConfigurationError(
        `windowSize must be a positive integer, got ${String(windowSize)}`,
        { details: { windowSize } },
      );
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new InvalidConfigurationError(
        `overlap must be a non-negative integer, got ${String(overlap)}`,
        { details: { overlap } },
      );
    }
    if (overlap >= windowSize) {
      throw new InvalidConfigurationError(
        `overlap (${String(overlap)}) must be smaller than windowSize (${String(windowSize)})`,
        { details: { windowSize, overlap } },
      );
    }

    this.config = { windowSize, overlap };
  }

  chunk(content: string): Chunk[] {
    const { windowSize, overlap } = this.config;
    const length = content.length;

    if (length <= windowSize) {
      const trimmed = content.trim();
      return trimmed.length > 0
        ? [{ index: 0, content: trimmed, startChar: 0, endChar: length }]
        : [];
    }

    const results: Chunk[] = [];
    let start = 0;

    while (start < length) {
      let end = Math.min(start + windowSize, length);

      if (end < length) {
        const boundary = findLastBoundary(content, Math.max(start, end - BOUNDARY_SEARCH_CHARS), end);
        // The next window starts at boundary + 1 - overlap; only move the end
        // when that still lies past the current start.
        if (boundary > start && boundary + 1 - overlap > start) {
          end = boundary + 1;
        }
      }

      const text = content.slice(start, end).trim();
      if (text.length > 0) {
        results.push({ index: results.length, content: text, startChar: start, endChar: end });
      }

      if (end >= length) break;
      start = end - overlap;
    }

    return results;
  }

  stats(content: string): ChunkStats {
    return computeChunkStats(content, this.chunk(content), this.config);
  }
}

/**
 * Describe how a text was split.
 */
export function computeChunkStats(
  content: string,
  chunks: readonly Chunk[],
  config: ChunkingConfig,
): ChunkStats {
  const totalChunkLength = chunks.reduce((sum, chunk) => sum + chunk.content.length, 0);

  return {
    totalLength: content.length,
    chunkCount: chunks.length,
    windowSize: config.windowSize,
    overlap: config.overlap,
    averageChunkLength: chunks.length > 0 ? totalChunkLength / chunks.length : 0,
  };
}

/**
 * Position of the last boundary marker lying entirely within `[from, to)`, or -1.
 */
function findLastBoundary(content: string, from: number, to: number): number {
  let best = -1;

  for (const marker of BOUNDARY_MARKERS) {
    const latestStart = to - marker.length;
    if (latestStart < from) continue;

    const position = content.lastIndexOf(marker, latestStart);
    if (position >= from && position > best) {
      best = position;
    }
  }

  return best;
}
