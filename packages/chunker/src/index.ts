export type { IChunker } from "./chunker.interface.js";
export { WindowChunker, computeChunkStats, BOUNDARY_SEARCH_CHARS } from "./window-chunker.js";
