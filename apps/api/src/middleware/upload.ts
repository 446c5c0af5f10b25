import multer from "multer";
import type { RequestHandler } from "express";
import { PayloadTooLargeError, ValidationError } from "@docdigest/errors";

export const UPLOAD_FIELD = "file";

const BYTES_PER_MB = 1024 * 1024;

/**
 * Buffers a single multipart file from the `file` field in memory.
 * Requests that are not multipart pass through untouched.
 */
export function createUploadMiddleware(maxUploadMb: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadMb * BYTES_PER_MB, files: 1 },
  }).single(UPLOAD_FIELD);

  return (req, res, next) => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        next(
          error.code === "LIMIT_FILE_SIZE"
            ? new PayloadTooLargeError(`File too large. Maximum size: ${String(maxUploadMb)}MB`)
            : new ValidationError(`Invalid upload: ${error.message}`, {
                [error.field ?? UPLOAD_FIELD]: error.message,
              }),
        );
        return;
      }
      next(error);
    });
  };
}
