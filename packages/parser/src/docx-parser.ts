import mammoth from "mammoth";
import type { ParseResult } from "@docdigest/types";
import type { IParser } from "./parser.interface.js";
import { DOCX_MIME_TYPE } from "./file-types.js";
import { toParseResult } from "./normalize.js";

/** Paragraph text of a Word document; formatting, images and tables' layout are dropped. */
export class DocxParser implements IParser {
  readonly supportedMimeTypes = [DOCX_MIME_TYPE];

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const buffer = typeof input === "string" ? Buffer.from(input, "utf8") : Buffer.from(input);
    const { value } = await mammoth.extractRawText({ buffer });
    return toParseResult(value, mimeType);
  }
}
