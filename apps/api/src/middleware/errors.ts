import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError } from "zod";
import { HttpError } from "../lib/errors";
import { getLogger } from "../lib/logger";

const log = getLogger("http");

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function apiNotFound(_req: Request, res: Response) {
  return res.status(404).json({ error: "NOT_FOUND" });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ error: err.issues[0]?.message ?? "BAD_REQUEST" });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: "Invalid JSON body" });
  }

  log.error({ err, method: req.method, url: req.originalUrl }, "unhandled error");
  return res.status(500).json({ error: "INTERNAL_ERROR" });
}
