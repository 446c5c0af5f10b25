import { readFile } from "node:fs/promises";
import { describe, it, expect } from "vitest";
import ExcelJS from "exceljs";
import { UnsupportedMediaTypeError } from "@docdigest/errors";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser } from "./docx-parser.js";
import { XlsxParser } from "./xlsx-parser.js";
import { getParser, baseMimeType } from "./factory.js";
import { normalizeText, countWords, toParseResult } from "./normalize.js";
import {
  DOCX_MIME_TYPE,
  PDF_MIME_TYPE,
  XLSX_MIME_TYPE,
  fileExtension,
  mimeTypeForExtension,
} from "./file-types.js";

function fixture(name: string): Promise<Buffer> {
  return readFile(new URL(`./__fixtures__/${name}`, import.meta.url));
}

async function buildWorkbook(): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  const sales = workbook.addWorksheet("Sales");
  sales.addRow(["Region", "Revenue"]);
  sales.addRow(["North", 120]);
  sales.addRow([]);
  sales.addRow(["South", 95]);
  workbook.addWorksheet("Empty");
  const notes = workbook.addWorksheet("Notes");
  notes.addRow(["Reviewed"]);
  return new Uint8Array(await workbook.xlsx.writeBuffer());
}

describe("normalizeText", () => {
  it("collapses spaces and squeezes runs of blank lines", () => {
    expect(normalizeText("  Title   line\r\n\r\n\r\n\r\nBody  text \n\n  next  ")).toBe(
      "Title line\n\nBody text \n\n next",
    );
  });

  it("keeps single blank lines between paragraphs", () => {
    expect(normalizeText("a\n\nb\n\n\n\nc")).toBe("a\n\nb\n\nc");
  });

  it("returns an empty string for whitespace", () => {
    expect(normalizeText(" \n \n ")).toBe("");
  });
});

describe("countWords", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords(" one two\nthree\t four ")).toBe(4);
    expect(countWords("")).toBe(0);
  });
});

describe("toParseResult", () => {
  it("normalizes the text and only sets pageCount when given", () => {
    expect(toParseResult("  a  b ", "text/plain")).toEqual({
      text: "a b",
      metadata: { mimeType: "text/plain", charCount: 3, wordCount: 2 },
    });
    expect(toParseResult("a", PDF_MIME_TYPE, 3).pageCount).toBe(3);
  });
});

describe("file types", () => {
  it("reads the lower-case extension of a file name", () => {
    expect(fileExtension("Report.Final.PDF")).toBe("pdf");
    expect(fileExtension("notes")).toBe("");
    expect(fileExtension(".env")).toBe("");
  });

  it("maps extensions to MIME types", () => {
    expect(mimeTypeForExtension("docx")).toBe(DOCX_MIME_TYPE);
    expect(mimeTypeForExtension("XLSX")).toBe(XLSX_MIME_TYPE);
    expect(mimeTypeForExtension("htm")).toBe("text/html");
    expect(mimeTypeForExtension("exe")).toBeUndefined();
  });
});

describe("TextParser", () => {
  const parser = new TextParser();

  it("supports text MIME types", () => {
    expect(parser.supportedMimeTypes).toEqual([
      "text/plain",
      "text/markdown",
      "text/csv",
      "text/html",
    ]);
  });

  it("parses and normalizes plain text", async () => {
    const result = await parser.parse("Hello   world", "text/plain");

    expect(result).toEqual({
      text: "Hello world",
      metadata: { mimeType: "text/plain", charCount: 11, wordCount: 2 },
    });
  });

  it("decodes UTF-8 bytes", async () => {
    const input = new TextEncoder().encode("Café résumé");
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("Café résumé");
  });

  it("falls back to Latin-1 for bytes that are not UTF-8", async () => {
    const input = Uint8Array.from([0x63, 0x61, 0x66, 0xe9]);
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("café");
  });

  it("strips HTML tags", async () => {
    const html = "<h1>Title</h1><p>Content with <b>bold</b> text</p>";
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Title Content with bold text");
  });

  it("strips script and style tags from HTML", async () => {
    const html = '<script>alert("x")</script><style>body{color:red}</style><p>Safe content</p>';
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Safe content");
  });
});

describe("PdfParser", () => {
  const parser = new PdfParser();

  it("extracts the text layer and counts pages", async () => {
    const result = await parser.parse(await fixture("quarterly-report.pdf"), PDF_MIME_TYPE);

    expect(result.pageCount).toBe(1);
    expect(result.text).toContain("Quarterly revenue grew across every region.");
    expect(result.text).toContain("Hiring slowed in the second half.");
    expect(result.metadata.mimeType).toBe(PDF_MIME_TYPE);
  });

  it("rejects bytes that are not a PDF", async () => {
    await expect(parser.parse(new TextEncoder().encode("plain words"), PDF_MIME_TYPE)).rejects.toThrow();
  });
});

describe("DocxParser", () => {
  const parser = new DocxParser();

  it("extracts paragraphs separated by blank lines", async () => {
    const result = await parser.parse(await fixture("meeting-notes.docx"), DOCX_MIME_TYPE);

    expect(result.text).toBe(
      "Meeting notes\n\nThe team agreed to ship the beta in May.\n\nBudget review follows next week.",
    );
    expect(result.metadata.wordCount).toBe(16);
  });

  it("rejects bytes that are not a Word document", async () => {
    await expect(parser.parse(Uint8Array.from([1, 2, 3, 4]), DOCX_MIME_TYPE)).rejects.toThrow();
  });
});

describe("XlsxParser", () => {
  const parser = new XlsxParser();

  it("renders each non-empty sheet with a header rule", async () => {
    const result = await parser.parse(await buildWorkbook(), XLSX_MIME_TYPE);

    expect(result.text).toBe(
      [
        "=== Sheet: Sales ===",
        "Region | Revenue",
        "----------------",
        "North | 120",
        "South | 95",
        "",
        "=== Sheet: Notes ===",
        "Reviewed",
        "--------",
      ].join("\n"),
    );
  });

  it("rejects bytes that are not a workbook", async () => {
    await expect(parser.parse(Uint8Array.from([1, 2, 3, 4]), XLSX_MIME_TYPE)).rejects.toThrow();
  });
});

describe("getParser factory", () => {
  it("returns the text parser for text types", () => {
    expect(getParser("text/plain")).toBeInstanceOf(TextParser);
    expect(getParser("text/markdown")).toBeInstanceOf(TextParser);
  });

  it("ignores parameters and case", () => {
    expect(baseMimeType("Text/Plain; charset=utf-8")).toBe("text/plain");
    expect(getParser("text/html; charset=UTF-8")).toBeInstanceOf(TextParser);
  });

  it("returns the document parsers for binary formats", () => {
    expect(getParser(PDF_MIME_TYPE)).toBeInstanceOf(PdfParser);
    expect(getParser(DOCX_MIME_TYPE)).toBeInstanceOf(DocxParser);
    expect(getParser(XLSX_MIME_TYPE)).toBeInstanceOf(XlsxParser);
  });

  it("rejects unsupported types", () => {
    expect(() => getParser("image/png")).toThrow(UnsupportedMediaTypeError);
    expect(() => getParser("image/png")).toThrow(
      `Unsupported content type "image/png". Supported: text/plain, text/markdown, text/csv, text/html, ${PDF_MIME_TYPE}, ${DOCX_MIME_TYPE}, ${XLSX_MIME_TYPE}`,
    );
  });
});
