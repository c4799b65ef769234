import { Router } from "express";
import bcrypt from "bcrypt";
import Database from "better-sqlite3";
import { eq } from "drizzle-orm";
import { DEFAULT_CATEGORIES, LoginBody, RegisterBody } from "@taskdesk/shared";
import { db } from "../lib/db";
import { env } from "../lib/env";
import { AuthError, ConflictError } from "../lib/errors";
import { getLogger } from "../lib/logger";
import { categories, users } from "../lib/schema";
import { clearSessionCookie, destroySession, readSessionId, startSession } from "../lib/session";
import { asyncHandler } from "../middleware/errors";

export const authRouter = Router();

const log = getLogger("auth");

function createUserWithDefaults(username: string, email: string, passwordHash: string) {
  try {
    return db.transaction((tx) => {
      const user = tx
        .insert(users)
        .values({ username, email, passwordHash, createdAt: new Date() })
        .returning()
        .get();
      tx.insert(categories)
        .values(DEFAULT_CATEGORIES.map((c) => ({ name: c.name, color: c.color, userId: user.id })))
        .run();
      return user;
    });
  } catch (e) {
    // lost a race with a concurrent registration for the same name or email
    if (e instanceof Database.SqliteError && e.code === "SQLITE_CONSTRAINT_UNIQUE") {
      throw new ConflictError(e.message.includes("users.email") ? "Email already exists" : "Username already exists");
    }
    throw e;
  }
}

authRouter.post(
  "/register",
  asyncHandler(async (req, res) => {
    const data = RegisterBody.parse(req.body);

    if (db.select({ id: users.id }).from(users).where(eq(users.username, data.username)).get()) {
      throw new ConflictError("Username already exists");
    }
    if (db.select({ id: users.id }).from(users).where(eq(users.email, data.email)).get()) {
      throw new ConflictError("Email already exists");
    }

    const passwordHash = await bcrypt.hash(data.password, env.BCRYPT_ROUNDS);
    const user = createUserWithDefaults(data.username, data.email, passwordHash);
    startSession(req, res, user.id);

    log.info({ userId: user.id }, "user registered");
    return res.status(201).json({ message: "Registration successful", username: user.username });
  })
);

authRouter.post(
  "/login",
  asyncHandler(async (req, res) => {
    const data = LoginBody.parse(req.body);

    const user = db.select().from(users).where(eq(users.username, data.username)).get();
    const ok = user ? await bcrypt.compare(data.password, user.passwordHash) : false;
    if (!user || !ok) throw new AuthError("Invalid username or password");

    startSession(req, res, user.id);
    return res.json({ message: "Login successful", username: user.username });
  })
);

authRouter.post("/logout", (req, res) => {
  const id = readSessionId(req);
  if (id) destroySession(id);
  clearSessionCookie(res);
  return res.json({ message: "Logout successful" });
});
