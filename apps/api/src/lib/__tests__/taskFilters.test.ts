import { describe, it, expect, beforeEach } from "vitest";
import { asc } from "drizzle-orm";
import { db } from "../db";
import { tasks } from "../schema";
import { allOf, buildTaskConditions, likePattern } from "../taskFilters";
import { insertUser, resetDatabase } from "../../__tests__/helpers";

describe("likePattern", () => {
  it("lowercases and wraps the text", () => {
    expect(likePattern("Milk")).toBe("%milk%");
  });

  it("escapes wildcards and the escape character", () => {
    expect(likePattern("50%_off!")).toBe("%50!%!_off!!%");
  });
});

describe("buildTaskConditions", () => {
  it("always scopes to the owner", () => {
    expect(buildTaskConditions(1, {})).toHaveLength(1);
  });

  it("adds one condition per filter and two for overdue", () => {
    const conditions = buildTaskConditions(1, {
      search: "x",
      status: "pending",
      priority: "high",
      category_id: 0,
      overdue: true
    });
    expect(conditions).toHaveLength(7);
  });

  it("ignores an overdue flag that is off", () => {
    expect(buildTaskConditions(1, { overdue: false })).toHaveLength(1);
  });
});

describe("task predicates against the store", () => {
  const now = new Date(Date.UTC(2025, 5, 15, 12));
  let userId: number;

  const titles = (q: Parameters<typeof buildTaskConditions>[1]) =>
    db
      .select({ title: tasks.title })
      .from(tasks)
      .where(allOf(buildTaskConditions(userId, q, now)))
      .orderBy(asc(tasks.id))
      .all()
      .map((r) => r.title);

  beforeEach(() => {
    resetDatabase();
    userId = insertUser().id;
    const other = insertUser("bob").id;
    const base = { createdAt: now, userId };
    db.insert(tasks)
      .values([
        { ...base, title: "Buy MILK", description: "", priority: "high", dueDate: new Date(Date.UTC(2025, 5, 14)) },
        { ...base, title: "Fix sink", description: "Call the plumber", status: "completed", dueDate: new Date(Date.UTC(2025, 5, 1)) },
        { ...base, title: "100% done", description: null, categoryId: 7, dueDate: new Date(Date.UTC(2025, 5, 20)) },
        { ...base, title: "milk for bob", userId: other }
      ])
      .run();
  });

  it("matches search against title or description, ignoring case", () => {
    expect(titles({ search: "milk" })).toEqual(["Buy MILK"]);
    expect(titles({ search: "PLUMBER" })).toEqual(["Fix sink"]);
  });

  it("treats % in the search text literally", () => {
    expect(titles({ search: "%" })).toEqual(["100% done"]);
  });

  it("counts only past, unfinished tasks as overdue", () => {
    expect(titles({ overdue: true })).toEqual(["Buy MILK"]);
  });

  it("intersects filters", () => {
    expect(titles({ priority: "high", status: "pending" })).toEqual(["Buy MILK"]);
    expect(titles({ priority: "high", status: "completed" })).toEqual([]);
    expect(titles({ category_id: 7 })).toEqual(["100% done"]);
  });
});
