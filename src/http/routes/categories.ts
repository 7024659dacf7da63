import type { Hono } from "hono";
import type { Services } from "../../services/services.js";
import { methodNotAllowed } from "../errors.js";
import { idParam, pageParam } from "../query.js";

export function registerCategoryRoutes(app: Hono, services: Services): void {
  const { categoryService, questionService } = services;

  /**
   * GET /categories
   * Every category as an id → label map (empty when there are none).
   */
  app.get("/categories", async (c) => {
    const categories = await categoryService.getCategoryMap();
    return c.json({ success: true, categories });
  });
  app.all("/categories", methodNotAllowed);

  /**
   * GET /categories/:id/questions?page=
   * 422 when no question references the category, even if the category exists.
   */
  app.get("/categories/:id{[0-9]+}/questions", async (c) => {
    const categoryId = idParam(c);
    const { questions, total } = await questionService.questionsByCategory(
      categoryId,
      pageParam(c)
    );
    return c.json({
      success: true,
      questions,
      currentCategory: categoryId,
      total_questions: total,
    });
  });
  app.all("/categories/:id{[0-9]+}/questions", methodNotAllowed);
}
