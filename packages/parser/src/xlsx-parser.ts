import ExcelJS from "exceljs";
import type { ParseResult } from "@docdigest/types";
import type { IParser } from "./parser.interface.js";
import { XLSX_MIME_TYPE } from "./file-types.js";
import { toParseResult } from "./normalize.js";

/**
 * Renders every worksheet as text:
 *
 * ```
 * === Sheet: Sales ===
 * Region | Revenue
 * ----------------
 * North | 120
 * ```
 *
 * The first non-empty row is treated as the header. Empty cells and rows are skipped.
 */
export class XlsxParser implements IParser {
  readonly supportedMimeTypes = [XLSX_MIME_TYPE];

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
    const data = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(data).set(bytes);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(data);

    const sheets: string[] = [];
    workbook.eachSheet((worksheet) => {
      const lines = [`=== Sheet: ${worksheet.name} ===`];

      worksheet.eachRow((row) => {
        const cells: string[] = [];
        row.eachCell((cell) => {
          const text = cell.text.trim();
          if (text) cells.push(text);
        });
        if (cells.length === 0) return;

        const line = cells.join(" | ");
        lines.push(line);
        if (lines.length === 2) {
          lines.push("-".repeat(line.length));
        }
      });

      if (lines.length > 1) {
        sheets.push(lines.join("\n"));
      }
    });

    return toParseResult(sheets.join("\n\n"), mimeType);
  }
}
