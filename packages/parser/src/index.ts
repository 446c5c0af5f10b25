export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { DocxParser } from "./docx-parser.js";
export { XlsxParser } from "./xlsx-parser.js";
export { getParser, baseMimeType } from "./factory.js";
export {
  fileExtension,
  mimeTypeForExtension,
  PDF_MIME_TYPE,
  DOCX_MIME_TYPE,
  XLSX_MIME_TYPE,
} from "./file-types.js";
export { normalizeText, countWords, toParseResult } from "./normalize.js";
