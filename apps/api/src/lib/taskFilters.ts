import { and, eq, lt, ne, sql, type SQL } from "drizzle-orm";
import type { TaskListQuery } from "@taskdesk/shared";
import { tasks } from "./schema";

/** Lowercased `%text%` with `!` escaping the LIKE wildcards, so the text matches literally. */
export function likePattern(text: string) {
  return `%${text.toLowerCase().replace(/[!%_]/g, (c) => `!${c}`)}%`;
}

export function searchCondition(text: string): SQL {
  const pattern = likePattern(text);
  return sql`(lower(${tasks.title}) like ${pattern} escape '!' or lower(coalesce(${tasks.description}, '')) like ${pattern} escape '!')`;
}

/** Due before `now` and not completed. A task without a due date is never overdue. */
export function overdueConditions(now: Date): SQL[] {
  return [lt(tasks.dueDate, now), ne(tasks.status, "completed")];
}

/**
 * Builds the owner-scoped predicate list for a task listing. Each supplied
 * filter adds its conditions; absent filters add nothing.
 */
export function buildTaskConditions(userId: number, q: Partial<TaskListQuery>, now = new Date()): SQL[] {
  const conditions: SQL[] = [eq(tasks.userId, userId)];

  if (q.search) conditions.push(searchCondition(q.search));
  if (q.status) conditions.push(eq(tasks.status, q.status));
  if (q.priority) conditions.push(eq(tasks.priority, q.priority));
  if (q.category_id !== undefined) conditions.push(eq(tasks.categoryId, q.category_id));
  if (q.overdue) conditions.push(...overdueConditions(now));

  return conditions;
}

/** ANDs a condition list. The list always holds the owner condition, so the result is defined. */
export function allOf(conditions: SQL[]): SQL {
  return and(...conditions) ?? sql`1 = 1`;
}
