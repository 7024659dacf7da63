import type { Hono } from "hono";
import type { Services } from "../../services/services.js";
import { methodNotAllowed } from "../errors.js";
import { idParam, pageParam } from "../query.js";
import { CreateQuestionBody, SearchBody, readBody } from "../validation.js";

export function registerQuestionRoutes(app: Hono, services: Services): void {
  const { questionService, categoryService } = services;

  /**
   * GET /questions?page=
   * Ten questions per page, plus the category of every question and the
   * category map. 404 when the page is empty.
   */
  app.get("/questions", async (c) => {
    const page = await questionService.listQuestions(pageParam(c));
    const categories = await categoryService.getCategoryMap();
    return c.json({
      success: true,
      questions: page.questions,
      total_questions: page.total,
      currentCategory: page.categoryIds,
      categories,
    });
  });

  /**
   * POST /questions?page=
   * Body: { question, answer, category, difficulty }
   */
  app.post("/questions", async (c) => {
    const input = await readBody(c, CreateQuestionBody);
    const result = await questionService.createQuestion(input, pageParam(c));
    return c.json({
      success: true,
      created: result.id,
      questions: result.questions,
      total_questions: result.total,
    });
  });
  app.all("/questions", methodNotAllowed);

  /**
   * DELETE /questions/:id?page=
   */
  app.delete("/questions/:id{[0-9]+}", async (c) => {
    const id = idParam(c);
    const result = await questionService.deleteQuestion(id, pageParam(c));
    return c.json({
      success: true,
      deleted: id,
      questions: result.questions,
      total_questions: result.total,
    });
  });
  app.all("/questions/:id{[0-9]+}", methodNotAllowed);

  /**
   * POST /search?page=
   * Body: { searchTerm } matched case-insensitively anywhere in the question.
   */
  app.post("/search", async (c) => {
    const { searchTerm } = await readBody(c, SearchBody);
    const result = await questionService.searchQuestions(
      searchTerm,
      pageParam(c)
    );
    return c.json({
      success: true,
      questions: result.questions,
      currentCategory: result.categoryIds,
      total_questions: result.total,
    });
  });
  app.all("/search", methodNotAllowed);
}
