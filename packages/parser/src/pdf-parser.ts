import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ParseResult } from "@docdigest/types";
import type { IParser } from "./parser.interface.js";
import { PDF_MIME_TYPE } from "./file-types.js";
import { toParseResult } from "./normalize.js";

/**
 * Extracts the text layer of each page with pdf.js. Scanned pages without a
 * text layer contribute nothing.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = [PDF_MIME_TYPE];

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    // pdf.js takes ownership of the buffer it is given, so hand it a copy.
    const data = typeof input === "string" ? new TextEncoder().encode(input) : Uint8Array.from(input);
    const document = await getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise;

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const content = await page.getTextContent();
        const text = content.items
          .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : ""}` : ""))
          .join("");
        if (text.trim()) {
          pages.push(text);
        }
        page.cleanup();
      }

      return toParseResult(pages.join("\n"), mimeType, document.numPages);
    } finally {
      await document.destroy();
    }
  }
}
