import request from "supertest";
import type { Express } from "express";
import { db } from "../lib/db";
import { categories, sessions, tasks, users } from "../lib/schema";

export function resetDatabase() {
  db.delete(sessions).run();
  db.delete(tasks).run();
  db.delete(categories).run();
  db.delete(users).run();
}

export const PASSWORD = "test-password";

/** Registers a user and returns an agent that carries their session cookie. */
export async function signUp(app: Express, username = "alice") {
  const agent = request.agent(app);
  await agent
    .post("/api/register")
    .send({ username, email: `${username}@example.com`, password: PASSWORD })
    .expect(201);
  return agent;
}

export function insertUser(username = "alice") {
  return db
    .insert(users)
    .values({ username, email: `${username}@example.com`, passwordHash: "not-a-real-hash", createdAt: new Date() })
    .returning()
    .get();
}
