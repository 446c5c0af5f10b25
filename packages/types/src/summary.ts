export type SummarizationStage =
  | "chunking"
  | "summarizing_chunks"
  | "merging"
  | "extracting_highlights"
  | "done"
  | "failed";

export interface ChunkSummary {
  index: number;
  text: string;
}

export interface SummaryResult {
  /** At most five short insights, in model output order. */
  highlights: string[];
  detailedSummary: string;
  chunkCount: number;
}
