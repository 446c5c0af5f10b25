import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import type { ApiResponse } from "@docdigest/types";
import { AppError, NotFoundError } from "@docdigest/errors";
import type { Logger } from "@docdigest/logger";
import { getRequestId } from "./request-id.js";

interface BodyParserError {
  status: number;
  type: string;
}

/** Errors raised by express.json() carry an http status and a `type` tag. */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string"
  );
}

function sendError(
  req: Request,
  res: Response,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): void {
  const body: ApiResponse = {
    success: false,
    error: { code, message, requestId: getRequestId(req), ...(details === undefined ? {} : { details }) },
  };
  res.status(status).json(body);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const log = req.log ?? logger;

    if (AppError.isAppError(err)) {
      if (err.statusCode >= 500) {
        log.error({ err, code: err.code }, err.message);
      } else {
        log.warn({ code: err.code }, err.message);
      }
      sendError(req, res, err.statusCode, err.code, err.message, err.details);
      return;
    }

    if (isBodyParserError(err)) {
      if (err.type === "entity.parse.failed") {
        sendError(req, res, 400, "INVALID_JSON", "Malformed JSON body");
        return;
      }
      if (err.type === "entity.too.large") {
        sendError(req, res, 413, "PAYLOAD_TOO_LARGE", "Request body too large");
        return;
      }
    }

    log.error({ err }, "Unhandled error");
    sendError(req, res, 500, "INTERNAL_ERROR", "Internal server error");
  };
}
