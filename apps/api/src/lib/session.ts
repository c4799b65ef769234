import crypto from "crypto";
import type { Request, Response } from "express";
import { and, eq, gt, lte } from "drizzle-orm";
import { db } from "./db";
import { env, isProduction } from "./env";
import { sessions, users } from "./schema";

export const SESSION_COOKIE = "sid";

const ttlMs = () => env.SESSION_TTL_HOURS * 60 * 60 * 1000;

export type SessionContext = {
  sessionId: string;
  userId: number;
  username: string;
};

export function createSession(userId: number, now = new Date()) {
  const id = crypto.randomBytes(32).toString("base64url");
  return db
    .insert(sessions)
    .values({ id, userId, createdAt: now, expiresAt: new Date(now.getTime() + ttlMs()) })
    .returning()
    .get();
}

/** Resolves a session token to its user; undefined once the token is unknown or expired. */
export function findActiveSession(id: string, now = new Date()): SessionContext | undefined {
  return db
    .select({ sessionId: sessions.id, userId: users.id, username: users.username })
    .from(sessions)
    .innerJoin(users, eq(users.id, sessions.userId))
    .where(and(eq(sessions.id, id), gt(sessions.expiresAt, now)))
    .get();
}

export function destroySession(id: string) {
  db.delete(sessions).where(eq(sessions.id, id)).run();
}

export function purgeExpiredSessions(now = new Date()): number {
  return db.delete(sessions).where(lte(sessions.expiresAt, now)).run().changes;
}

export function readSessionId(req: Request): string | undefined {
  // cookie-parser sets a tampered signed cookie to false
  const raw: unknown = req.signedCookies?.[SESSION_COOKIE];
  return typeof raw === "string" && raw ? raw : undefined;
}

export function setSessionCookie(res: Response, id: string) {
  res.cookie(SESSION_COOKIE, id, {
    httpOnly: true,
    sameSite: "lax",
    secure: isProduction,
    signed: true,
    maxAge: ttlMs(),
    path: "/"
  });
}

export function clearSessionCookie(res: Response) {
  res.clearCookie(SESSION_COOKIE, { httpOnly: true, sameSite: "lax", secure: isProduction, path: "/" });
}

/** Starts a fresh session for the user, dropping the one the request carried, if any. */
export function startSession(req: Request, res: Response, userId: number) {
  const previous = readSessionId(req);
  if (previous) destroySession(previous);
  const session = createSession(userId);
  setSessionCookie(res, session.id);
  return session;
}
