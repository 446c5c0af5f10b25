export interface ParseResult {
  text: string;
  /** Set by paged formats (PDF). */
  pageCount?: number;
  metadata: {
    mimeType: string;
    charCount: number;
    wordCount: number;
  };
}
