import { Router } from "express";
import { and, asc, eq } from "drizzle-orm";
import { CreateCategoryBody, DEFAULT_CATEGORY_COLOR } from "@taskdesk/shared";
import { authMiddleware, currentUser } from "../middleware/auth";
import { db } from "../lib/db";
import { NotFoundError } from "../lib/errors";
import { parseId } from "../lib/params";
import { categories } from "../lib/schema";
import { toCategoryDto } from "../lib/serializers";

export const categoriesRouter = Router();

categoriesRouter.get("/", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const items = db.select().from(categories).where(eq(categories.userId, userId)).orderBy(asc(categories.id)).all();
  return res.json(items.map(toCategoryDto));
});

categoriesRouter.post("/", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const data = CreateCategoryBody.parse(req.body);
  const item = db
    .insert(categories)
    .values({ userId, name: data.name, color: data.color ?? DEFAULT_CATEGORY_COLOR })
    .returning()
    .get();
  return res.status(201).json(toCategoryDto(item));
});

// Tasks that point at the category keep their category_id.
categoriesRouter.delete("/:id", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  const id = parseId(req.params.id, "Category not found");

  const category = db
    .select()
    .from(categories)
    .where(and(eq(categories.id, id), eq(categories.userId, userId)))
    .get();
  if (!category) throw new NotFoundError("Category not found");

  db.delete(categories).where(eq(categories.id, id)).run();
  return res.json({ message: "Category deleted successfully" });
});
