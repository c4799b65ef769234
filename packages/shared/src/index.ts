import { z } from "zod";

export const TASK_STATUSES = ["pending", "in-progress", "completed"] as const;
export const TASK_PRIORITIES = ["low", "medium", "high"] as const;

export const TaskStatus = z.enum(TASK_STATUSES, {
  errorMap: () => ({ message: "Invalid status" })
});
export type TaskStatus = z.infer<typeof TaskStatus>;

export const TaskPriority = z.enum(TASK_PRIORITIES, {
  errorMap: () => ({ message: "Invalid priority" })
});
export type TaskPriority = z.infer<typeof TaskPriority>;

export const DEFAULT_CATEGORY_COLOR = "#6c757d";

export const DEFAULT_CATEGORIES = [
  { name: "Work", color: "#0d6efd" },
  { name: "Personal", color: "#198754" },
  { name: "Shopping", color: "#ffc107" },
  { name: "Health", color: "#dc3545" }
] as const;

export const Category = z.object({
  id: z.number().int(),
  name: z.string(),
  color: z.string(),
  user_id: z.number().int()
});
export type Category = z.infer<typeof Category>;

export const Task = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  status: TaskStatus,
  priority: TaskPriority,
  due_date: z.string().nullable(), // YYYY-MM-DD
  category_id: z.number().int().nullable(),
  user_id: z.number().int(),
  created_at: z.string() // ISO
});
export type Task = z.infer<typeof Task>;

// Bodies are checked field by field so that the first failing field names itself.
const requiredText = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).min(1, message);

export const RegisterBody = z.object({
  username: requiredText("All fields are required"),
  email: requiredText("All fields are required"),
  password: requiredText("All fields are required")
});
export type RegisterBody = z.infer<typeof RegisterBody>;

export const LoginBody = z.object({
  username: requiredText("Username and password are required"),
  password: requiredText("Username and password are required")
});
export type LoginBody = z.infer<typeof LoginBody>;

export const CreateCategoryBody = z.object({
  name: requiredText("Category name is required"),
  color: z.string().max(20).optional()
});
export type CreateCategoryBody = z.infer<typeof CreateCategoryBody>;

const categoryRef = z.union([z.number().int(), z.null()], {
  errorMap: () => ({ message: "Invalid category_id" })
});

// due_date stays a raw string here; the API parses it as a calendar day.
const dueDate = z.union([z.string(), z.null()], {
  errorMap: () => ({ message: "Invalid date format" })
});

export const CreateTaskBody = z.object({
  title: requiredText("Title is required"),
  description: z.string().nullable().optional(),
  status: TaskStatus.optional(),
  priority: TaskPriority.optional(),
  category_id: categoryRef.optional(),
  due_date: dueDate.optional()
});
export type CreateTaskBody = z.infer<typeof CreateTaskBody>;

export const UpdateTaskBody = CreateTaskBody.partial();
export type UpdateTaskBody = z.infer<typeof UpdateTaskBody>;

// Query strings: an empty parameter is the same as an absent one.
const emptyToUndefined = (v: unknown) => (v === "" ? undefined : v);
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

export const TaskListQuery = z.object({
  search: z.preprocess(emptyToUndefined, z.string().optional()),
  status: z.preprocess(emptyToUndefined, TaskStatus.optional()),
  priority: z.preprocess(emptyToUndefined, TaskPriority.optional()),
  category_id: z.preprocess(
    blankToUndefined,
    z
      .string({ invalid_type_error: "Invalid category_id" })
      .regex(/^-?\d+$/, "Invalid category_id")
      .transform(Number)
      .optional()
  ),
  overdue: z.preprocess(emptyToUndefined, z.string().optional()).transform((v) => v === "true")
});
export type TaskListQuery = z.infer<typeof TaskListQuery>;

export type CategoryCount = {
  name: string;
  count: number;
  color: string;
};

export type Stats = {
  total_tasks: number;
  completed: number;
  pending: number;
  in_progress: number;
  overdue: number;
  high_priority: number;
  completion_rate: number;
  tasks_by_category: CategoryCount[];
};

export type AuthResponse = {
  message: string;
  username: string;
};

export type MessageResponse = {
  message: string;
};
