import { Router } from "express";
import { and, desc, eq } from "drizzle-orm";
import { CreateTaskBody, TaskListQuery, UpdateTaskBody } from "@taskdesk/shared";
import { authMiddleware, currentUser } from "../middleware/auth";
import { db } from "../lib/db";
import { parseDueDate } from "../lib/dates";
import { NotFoundError } from "../lib/errors";
import { parseId } from "../lib/params";
import { tasks, type NewTaskRow } from "../lib/schema";
import { toTaskDto } from "../lib/serializers";
import { allOf, buildTaskConditions } from "../lib/taskFilters";

export const tasksRouter = Router();

function findOwnedTask(userId: number, rawId: string | undefined) {
  const id = parseId(rawId, "Task not found");
  const task = db
    .select()
    .from(tasks)
    .where(and(eq(tasks.id, id), eq(tasks.userId, userId)))
    .get();
  if (!task) throw new NotFoundError("Task not found");
  return task;
}

tasksRouter.get("/", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const q = TaskListQuery.parse(req.query);

  const items = db
    .select()
    .from(tasks)
    .where(allOf(buildTaskConditions(userId, q)))
    .orderBy(desc(tasks.createdAt), desc(tasks.id))
    .all();

  return res.json(items.map(toTaskDto));
});

tasksRouter.get("/:id", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  return res.json(toTaskDto(findOwnedTask(userId, req.params.id)));
});

tasksRouter.post("/", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const data = CreateTaskBody.parse(req.body);
  const dueDate = data.due_date === undefined ? null : parseDueDate(data.due_date);

  // category_id is stored as given, without checking who owns the category
  const task = db
    .insert(tasks)
    .values({
      userId,
      title: data.title,
      description: data.description ?? "",
      status: data.status ?? "pending",
      priority: data.priority ?? "medium",
      dueDate,
      categoryId: data.category_id ?? null,
      createdAt: new Date()
    })
    .returning()
    .get();

  return res.status(201).json(toTaskDto(task));
});

tasksRouter.put("/:id", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const existing = findOwnedTask(userId, req.params.id);
  const data = UpdateTaskBody.parse(req.body);

  // Only fields present in the body change. Everything is validated before the write.
  const patch: Partial<NewTaskRow> = {};
  if (data.title !== undefined) patch.title = data.title;
  if (data.description !== undefined) patch.description = data.description;
  if (data.status !== undefined) patch.status = data.status;
  if (data.priority !== undefined) patch.priority = data.priority;
  if (data.category_id !== undefined) patch.categoryId = data.category_id;
  if (data.due_date !== undefined) patch.dueDate = parseDueDate(data.due_date);

  if (Object.keys(patch).length === 0) return res.json(toTaskDto(existing));

  const updated = db.update(tasks).set(patch).where(eq(tasks.id, existing.id)).returning().get();
  return res.json(toTaskDto(updated ?? existing));
});

tasksRouter.delete("/:id", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const existing = findOwnedTask(userId, req.params.id);

  db.delete(tasks).where(eq(tasks.id, existing.id)).run();
  return res.json({ message: "Task deleted successfully" });
});
