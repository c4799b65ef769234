import { describe, it, expect, beforeEach } from "vitest";
import { db } from "../db";
import { sessions } from "../schema";
import { createSession, destroySession, findActiveSession, purgeExpiredSessions } from "../session";
import { insertUser, resetDatabase } from "../../__tests__/helpers";

const HOUR = 60 * 60 * 1000;

describe("sessions", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("issues opaque tokens that resolve to the user", () => {
    const user = insertUser();
    const session = createSession(user.id);

    expect(session.id).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(findActiveSession(session.id)).toEqual({ sessionId: session.id, userId: user.id, username: "alice" });
  });

  it("expires after the configured lifetime", () => {
    const user = insertUser();
    const created = new Date(Date.now() - 200 * HOUR);
    const session = createSession(user.id, created);

    expect(session.expiresAt.getTime()).toBe(created.getTime() + 168 * HOUR);
    expect(findActiveSession(session.id)).toBeUndefined();
  });

  it("forgets destroyed and unknown tokens", () => {
    const user = insertUser();
    const session = createSession(user.id);
    destroySession(session.id);

    expect(findActiveSession(session.id)).toBeUndefined();
    expect(findActiveSession("no-such-token")).toBeUndefined();
  });

  it("purges only expired rows", () => {
    const user = insertUser();
    createSession(user.id, new Date(Date.now() - 200 * HOUR));
    const live = createSession(user.id);

    expect(purgeExpiredSessions()).toBe(1);
    expect(db.select().from(sessions).all().map((s) => s.id)).toEqual([live.id]);
  });
});
