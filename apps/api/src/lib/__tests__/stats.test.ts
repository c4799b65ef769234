import { describe, it, expect, beforeEach } from "vitest";
import { db } from "../db";
import { categories, tasks } from "../schema";
import { completionRate, computeStats } from "../stats";
import { insertUser, resetDatabase } from "../../__tests__/helpers";

describe("completionRate", () => {
  it("is 0 when there are no tasks", () => {
    expect(completionRate(0, 0)).toBe(0);
  });

  it("rounds to one decimal place", () => {
    expect(completionRate(1, 3)).toBe(33.3);
    expect(completionRate(2, 3)).toBe(66.7);
    expect(completionRate(2, 4)).toBe(50);
  });

  it("rounds exact ties to the even digit", () => {
    expect(completionRate(1, 16)).toBe(6.2);
    expect(completionRate(1, 80)).toBe(1.2);
    expect(completionRate(3, 16)).toBe(18.8);
  });
});

describe("computeStats", () => {
  const now = new Date(Date.UTC(2025, 0, 10));
  const past = new Date(Date.UTC(2025, 0, 1));

  beforeEach(() => {
    resetDatabase();
  });

  it("is all zeros for a user without tasks", () => {
    const user = insertUser();
    expect(computeStats(user.id, now)).toEqual({
      total_tasks: 0,
      completed: 0,
      pending: 0,
      in_progress: 0,
      overdue: 0,
      high_priority: 0,
      completion_rate: 0,
      tasks_by_category: []
    });
  });

  it("counts only the user's own tasks", () => {
    const alice = insertUser("alice");
    const bob = insertUser("bob");
    const work = db.insert(categories).values({ name: "Work", color: "#0d6efd", userId: alice.id }).returning().get();
    db.insert(categories).values({ name: "Idle", color: "#000000", userId: alice.id }).run();
    const base = { createdAt: now, userId: alice.id };

    db.insert(tasks)
      .values([
        { ...base, title: "a", priority: "high", dueDate: past, categoryId: work.id },
        { ...base, title: "b", status: "in-progress", dueDate: past, categoryId: work.id },
        { ...base, title: "c", status: "completed", priority: "high", dueDate: past },
        { ...base, title: "d", status: "completed" },
        { ...base, title: "e", userId: bob.id, categoryId: work.id }
      ])
      .run();

    expect(computeStats(alice.id, now)).toEqual({
      total_tasks: 4,
      completed: 2,
      pending: 1,
      in_progress: 1,
      overdue: 2,
      high_priority: 1,
      completion_rate: 50,
      tasks_by_category: [{ name: "Work", count: 2, color: "#0d6efd" }]
    });
  });
});
