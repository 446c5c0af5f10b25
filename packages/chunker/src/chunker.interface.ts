import type { Chunk, ChunkingConfig } from "@docdigest/types";

export interface IChunker {
  readonly strategy: string;
  readonly config: ChunkingConfig;
  chunk(content: string): Chunk[];
}
