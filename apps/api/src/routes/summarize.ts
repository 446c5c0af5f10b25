import { Router } from "express";
import { z } from "zod";
import type { Request } from "express";
import type { ApiResponse, ParseResult, SummarizeResponseData } from "@docdigest/types";
import type { Summarizer } from "@docdigest/core";
import { AppError, ExtractionFailedError, ValidationError } from "@docdigest/errors";
import { baseMimeType, fileExtension, getParser, mimeTypeForExtension } from "@docdigest/parser";
import { asyncHandler } from "../middleware/async-handler.js";
import { UPLOAD_FIELD, createUploadMiddleware } from "../middleware/upload.js";

const DEFAULT_FILE_NAME = "document.txt";

export const summarizeBodySchema = z.object({
  content: z.string().min(1, "content must not be empty"),
  fileName: z.string().min(1).optional(),
  mimeType: z.string().min(1).default("text/plain"),
});

function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[path] ??= issue.message;
  }
  return fields;
}

/** A document to summarize, whichever way it arrived. */
interface IncomingDocument {
  fileName: string;
  /** Extension for uploads, base MIME type for JSON bodies. */
  fileType: string;
  mimeType: string;
  content: Uint8Array | string;
}

function fromUpload(file: Express.Multer.File, allowedExtensions: readonly string[]): IncomingDocument {
  const extension = fileExtension(file.originalname);
  const mimeType = allowedExtensions.includes(extension) ? mimeTypeForExtension(extension) : undefined;

  if (mimeType === undefined) {
    throw new ValidationError(`Unsupported file type. Allowed: ${allowedExtensions.join(", ")}`, {
      [UPLOAD_FIELD]: `"${file.originalname}" has no allowed extension`,
    });
  }

  return { fileName: file.originalname, fileType: extension, mimeType, content: file.buffer };
}

function fromJsonBody(body: unknown): IncomingDocument {
  const parsed = summarizeBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError("Invalid request body", fieldErrors(parsed.error));
  }

  const { content, fileName = DEFAULT_FILE_NAME, mimeType } = parsed.data;
  const fileType = baseMimeType(mimeType);
  return { fileName, fileType, mimeType: fileType, content };
}

function incomingDocument(req: Request, allowedExtensions: readonly string[]): IncomingDocument {
  return req.file ? fromUpload(req.file, allowedExtensions) : fromJsonBody(req.body);
}

async function extractText({ mimeType, content }: Pick<IncomingDocument, "mimeType" | "content">): Promise<ParseResult> {
  // Throws UnsupportedMediaTypeError before any model call
  const parser = getParser(mimeType);
  try {
    return await parser.parse(content, mimeType);
  } catch (error: unknown) {
    throw AppError.isAppError(error) ? error : new ExtractionFailedError(error);
  }
}

export interface SummarizeRouteDeps {
  summarizer: Summarizer;
  model: string;
  minTextLength: number;
  maxUploadMb: number;
  allowedExtensions: readonly string[];
}

/**
 * `POST /summarize` takes either a multipart upload in the `file` field or a
 * JSON body `{ content, fileName?, mimeType? }`.
 */
export function createSummarizeRouter({
  summarizer,
  model,
  minTextLength,
  maxUploadMb,
  allowedExtensions,
}: SummarizeRouteDeps): Router {
  const router = Router();

  router.post(
    "/summarize",
    createUploadMiddleware(maxUploadMb),
    asyncHandler(async (req, res) => {
      const startTime = performance.now();

      const { fileName, fileType, ...source } = incomingDocument(req, allowedExtensions);
      const { text, metadata } = await extractText(source);

      if (text.length < minTextLength) {
        throw new ValidationError("Insufficient text content in document", {
          content: `Extracted ${String(text.length)} characters; at least ${String(minTextLength)} required`,
        });
      }

      req.log?.info({ fileName, charCount: metadata.charCount, wordCount: metadata.wordCount }, "Processing document");

      const summary = await summarizer.summarize(text);
      const processingTimeSec = Math.round(performance.now() - startTime) / 1000;

      req.log?.info({ fileName, processingTimeSec, chunkCount: summary.chunkCount }, "Document summarized");

      const body: ApiResponse<SummarizeResponseData> = {
        success: true,
        data: {
          fileName,
          fileType,
          summaryShort: summary.highlights,
          summaryDetailed: summary.detailedSummary,
          model,
          chunkCount: summary.chunkCount,
          processingTimeSec,
        },
      };
      res.json(body);
    }),
  );

  return router;
}
