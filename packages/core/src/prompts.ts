export const SYSTEM_MESSAGE =
  "You are a helpful assistant. Keep your answers concise and accurate.";

export function chunkPrompt(text: string): string {
  return `Read the text below and explain what it is about in 2-3 natural sentences, the way you would describe it to a colleague.

Keep it conversational and brief. Focus on the main points and anything that stands out.

Text:
${text}

Explanation:`;
}

export function mergePrompt(numberedSummaries: string): string {
  return `You explain documents and data in plain, conversational language.

Each item below summarizes one section of the same document, in order. Write one flowing paragraph of 2-4 sentences that tells a colleague what the whole document is about.

Cover the overall story, the key patterns, and what stands out. Be concise.

Section summaries:
${numberedSummaries}

Summary (2-4 sentences):`;
}

export function highlightPrompt(summary: string): string {
  return `From the summary below, list 3-5 key insights as short, specific sentences that capture what matters most.

Put each insight on its own line starting with '-'.

Summary:
${summary}

Key insights:
`;
}

/**
 * Number summaries from 1 and separate them with blank lines.
 */
export function numberSummaries(summaries: readonly string[]): string {
  return summaries.map((summary, i) => `${String(i + 1)}. ${summary}`).join("\n\n");
}
