import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { TASK_PRIORITIES, TASK_STATUSES } from "@taskdesk/shared";

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  username: text("username").notNull().unique(),
  email: text("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull()
});

export const categories = sqliteTable(
  "categories",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    color: text("color").notNull(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id)
  },
  (t) => ({
    userIdx: index("idx_categories_user_id").on(t.userId)
  })
);

// category_id carries no foreign key: deleting a category leaves the value in place.
export const tasks = sqliteTable(
  "tasks",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    description: text("description"),
    status: text("status", { enum: TASK_STATUSES }).notNull().default("pending"),
    priority: text("priority", { enum: TASK_PRIORITIES }).notNull().default("medium"),
    dueDate: integer("due_date", { mode: "timestamp_ms" }),
    categoryId: integer("category_id"),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull()
  },
  (t) => ({
    userCreatedIdx: index("idx_tasks_user_created").on(t.userId, t.createdAt)
  })
);

export const sessions = sqliteTable(
  "sessions",
  {
    id: text("id").primaryKey(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull()
  },
  (t) => ({
    expiresIdx: index("idx_sessions_expires_at").on(t.expiresAt)
  })
);

export type UserRow = typeof users.$inferSelect;
export type CategoryRow = typeof categories.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
export type SessionRow = typeof sessions.$inferSelect;
