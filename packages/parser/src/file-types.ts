import { extname } from "node:path";

export const PDF_MIME_TYPE = "application/pdf";
export const DOCX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const EXTENSION_MIME_TYPES: Readonly<Record<string, string>> = {
  txt: "text/plain",
  md: "text/markdown",
  csv: "text/csv",
  html: "text/html",
  htm: "text/html",
  pdf: PDF_MIME_TYPE,
  docx: DOCX_MIME_TYPE,
  xlsx: XLSX_MIME_TYPE,
};

/** Lower-case extension without the dot; empty when the name has none. */
export function fileExtension(fileName: string): string {
  return extname(fileName).slice(1).toLowerCase();
}

export function mimeTypeForExtension(extension: string): string | undefined {
  return EXTENSION_MIME_TYPES[extension.toLowerCase()];
}
