import type { Request, Response, NextFunction } from "express";
import { AuthError } from "../lib/errors";
import { findActiveSession, readSessionId, type SessionContext } from "../lib/session";

declare global {
  namespace Express {
    interface Request {
      auth?: SessionContext;
    }
  }
}

/** Attaches the session's user to the request when the cookie resolves; never rejects. */
export function loadSession(req: Request, _res: Response, next: NextFunction) {
  const id = readSessionId(req);
  const session = id ? findActiveSession(id) : undefined;
  if (session) req.auth = session;
  return next();
}

export function authMiddleware(req: Request, _res: Response, next: NextFunction) {
  if (!req.auth) return next(new AuthError());
  return next();
}

/** The current user of an authenticated request. */
export function currentUser(req: Request): SessionContext {
  if (!req.auth) throw new AuthError();
  return req.auth;
}
