export { Summarizer } from "./summarizer.js";
export type { SummarizerDependencies } from "./summarizer.js";

export { parseHighlights, MAX_HIGHLIGHTS } from "./highlight-parser.js";
export { mapWithConcurrencyLimit } from "./concurrency.js";
export {
  SYSTEM_MESSAGE,
  chunkPrompt,
  mergePrompt,
  highlightPrompt,
  numberSummaries,
} from "./prompts.js";
