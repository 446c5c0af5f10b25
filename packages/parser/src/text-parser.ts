import type { ParseResult } from "@docdigest/types";
import type { IParser } from "./parser.interface.js";
import { toParseResult } from "./normalize.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown", "text/csv", "text/html"];

/**
 * Plain text, markdown, CSV and HTML parser.
 * Byte input is read as UTF-8, falling back to Latin-1 when it is not valid UTF-8.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const raw = typeof input === "string" ? input : decode(input);
    return toParseResult(mimeType === "text/html" ? this.stripHtml(raw) : raw, mimeType);
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/\s+/g, " ")
      .trim();
  }
}

function decode(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder("latin1").decode(bytes);
  }
}
