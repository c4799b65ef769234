import { and, asc, count, eq, type SQL } from "drizzle-orm";
import type { CategoryCount, Stats } from "@taskdesk/shared";
import { db } from "./db";
import { categories, tasks } from "./schema";
import { allOf, overdueConditions } from "./taskFilters";

/** Rounds to one decimal; an exact tie goes to the even digit (6.25 -> 6.2, 18.75 -> 18.8). */
export function roundHalfEven1(value: number) {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  if (diff === 0.5) return (floor % 2 === 0 ? floor : floor + 1) / 10;
  return Math.round(scaled) / 10;
}

/** completed / total as a percentage with one decimal; 0 for an empty list. */
export function completionRate(completed: number, total: number) {
  if (total <= 0) return 0;
  return roundHalfEven1((completed / total) * 100);
}

function countTasks(conditions: SQL[]) {
  return db.select({ value: count() }).from(tasks).where(allOf(conditions)).get()?.value ?? 0;
}

export function tasksByCategory(userId: number): CategoryCount[] {
  return db
    .select({ name: categories.name, count: count(tasks.id), color: categories.color })
    .from(categories)
    .innerJoin(tasks, and(eq(tasks.categoryId, categories.id), eq(tasks.userId, userId)))
    .where(eq(categories.userId, userId))
    .groupBy(categories.id)
    .orderBy(asc(categories.id))
    .all();
}

export function computeStats(userId: number, now = new Date()): Stats {
  const owned = eq(tasks.userId, userId);

  const total = countTasks([owned]);
  const completed = countTasks([owned, eq(tasks.status, "completed")]);
  const pending = countTasks([owned, eq(tasks.status, "pending")]);
  const inProgress = countTasks([owned, eq(tasks.status, "in-progress")]);
  const overdue = countTasks([owned, ...overdueConditions(now)]);
  const highPriority = countTasks([owned, eq(tasks.priority, "high"), eq(tasks.status, "pending")]);

  return {
    total_tasks: total,
    completed,
    pending,
    in_progress: inProgress,
    overdue,
    high_priority: highPriority,
    completion_rate: completionRate(completed, total),
    tasks_by_category: tasksByCategory(userId)
  };
}
