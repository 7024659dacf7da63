import type { Hono } from "hono";
import type { Services } from "../../services/services.js";
import { methodNotAllowed } from "../errors.js";
import { QuizBody, readBody } from "../validation.js";

export function registerQuizRoutes(app: Hono, services: Services): void {
  const { quizService } = services;

  /**
   * POST /quizzes
   * Body: { previous_questions: number[], quiz_category: { id } }
   * `question` is null once the category has nothing left to ask.
   */
  app.post("/quizzes", async (c) => {
    const body = await readBody(c, QuizBody);
    const question = await quizService.nextQuestion({
      previousQuestions: body.previous_questions,
      categoryId: body.quiz_category.id,
    });
    return c.json({ success: true, question });
  });
  app.all("/quizzes", methodNotAllowed);
}
