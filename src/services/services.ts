import type { SqliteClient } from "../db/sqlite.js";
import { CategoryRepositorySqlite } from "../domain/categories/categoryRepositorySqlite.js";
import { QuestionRepositorySqlite } from "../domain/questions/questionRepositorySqlite.js";
import type { RandomIndex } from "../domain/quiz.js";
import { CategoryServiceImpl, type CategoryService } from "./category.service.js";
import { createHealthService, type HealthService } from "./health.service.js";
import { QuestionServiceImpl, type QuestionService } from "./question.service.js";
import { QuizServiceImpl, type QuizService } from "./quiz.service.js";

export interface Services {
  categoryService: CategoryService;
  questionService: QuestionService;
  quizService: QuizService;
  healthService: HealthService;
}

export interface ServiceOptions {
  /** Replaces Math.random for quiz draws. */
  randomIndex?: RandomIndex;
}

export function createServices(
  db: SqliteClient,
  options: ServiceOptions = {}
): Services {
  const questions = new QuestionRepositorySqlite(db);
  const categories = new CategoryRepositorySqlite(db);
  return {
    categoryService: new CategoryServiceImpl(categories),
    questionService: new QuestionServiceImpl(questions),
    quizService: new QuizServiceImpl(questions, options.randomIndex),
    healthService: createHealthService(questions, categories),
  };
}
