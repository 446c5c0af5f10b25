import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "@docdigest/logger";

// Extend Express Request with the request id and its scoped logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
    }
  }
}

export const REQUEST_ID_HEADER = "x-request-id";

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

/**
 * Assigns every request an id (the caller's `x-request-id` when supplied),
 * echoes it back, and attaches a child logger bound to it.
 */
export function createRequestIdMiddleware(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const supplied = req.header(REQUEST_ID_HEADER)?.trim();
    const requestId = supplied ? supplied : randomUUID();

    req.requestId = requestId;
    req.log = logger.child({ requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}
