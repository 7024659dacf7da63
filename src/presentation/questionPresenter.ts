import type { FormattedQuestion, QuestionRow } from "../domain/types.js";

export function formatQuestion(q: QuestionRow): FormattedQuestion {
  return {
    id: q.id,
    question: q.question,
    answer: q.answer,
    category: q.category,
    difficulty: q.difficulty,
  };
}

export function formatQuestions(rows: readonly QuestionRow[]): FormattedQuestion[] {
  return rows.map(formatQuestion);
}
