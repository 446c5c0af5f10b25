import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Forward rejections from an async route to Express's error pipeline.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
