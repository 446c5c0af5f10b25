import { UnsupportedMediaTypeError } from "@docdigest/errors";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser } from "./docx-parser.js";
import { XlsxParser } from "./xlsx-parser.js";

const allParsers: IParser[] = [new TextParser(), new PdfParser(), new DocxParser(), new XlsxParser()];

/**
 * Strip parameters such as `; charset=utf-8` and lower-case the type.
 */
export function baseMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}

/**
 * Select the parser for a MIME type.
 */
export function getParser(mimeType: string): IParser {
  const type = baseMimeType(mimeType);
  const parser = allParsers.find((p) => p.supportedMimeTypes.includes(type));

  if (!parser) {
    throw new UnsupportedMediaTypeError(
      type,
      allParsers.flatMap((p) => p.supportedMimeTypes),
    );
  }

  return parser;
}
