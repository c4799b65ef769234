import type { Category, Task } from "@taskdesk/shared";
import type { CategoryRow, TaskRow } from "./schema";
import { formatDueDate } from "./dates";

export function toCategoryDto(c: CategoryRow): Category {
  return { id: c.id, name: c.name, color: c.color, user_id: c.userId };
}

export function toTaskDto(t: TaskRow): Task {
  return {
    id: t.id,
    title: t.title,
    description: t.description,
    status: t.status,
    priority: t.priority,
    due_date: formatDueDate(t.dueDate),
    category_id: t.categoryId,
    user_id: t.userId,
    created_at: t.createdAt.toISOString()
  };
}
