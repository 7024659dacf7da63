import type { CategoryRepository } from "../domain/categories/categoryRepository.js";
import type { QuestionRepository } from "../domain/questions/questionRepository.js";

export interface HealthReport {
  questions: number;
  categories: number;
}

export interface HealthService {
  check(): Promise<HealthReport>;
}

export function createHealthService(
  questions: QuestionRepository,
  categories: CategoryRepository
): HealthService {
  return {
    check: async () => {
      const [q, c] = await Promise.all([questions.count(), categories.count()]);
      return { questions: q, categories: c };
    },
  };
}
