export interface Chunk {
  /** Zero-based position of the chunk in the document. */
  index: number;
  /** Trimmed text of the window. Never empty. */
  content: string;
  /** Offset of the untrimmed window start in the source text. */
  startChar: number;
  /** Exclusive offset of the untrimmed window end in the source text. */
  endChar: number;
}

export interface ChunkingConfig {
  /** Maximum characters per window before boundary-aware trimming. */
  windowSize: number;
  /** Characters shared between consecutive windows. */
  overlap: number;
}

export interface ChunkStats {
  totalLength: number;
  chunkCount: number;
  windowSize: number;
  overlap: number;
  averageChunkLength: number;
}
