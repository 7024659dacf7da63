import { describe, it, expect, vi, afterEach } from "vitest";
import type { SqliteClient } from "../db/sqlite.js";
import { QuestionRepositorySqlite } from "../domain/questions/questionRepositorySqlite.js";
import type { NewQuestion } from "../domain/types.js";
import { createTestDb } from "../__tests__/helpers.js";
import { QuizServiceImpl } from "./quiz.service.js";

const q = (category: number): NewQuestion => ({
  question: `Question in ${category}`,
  answer: "A",
  category,
  difficulty: 1,
});

describe("QuizServiceImpl", () => {
  let db: SqliteClient;

  afterEach(async () => {
    await db.close();
  });

  it("returns null once every question of the category was asked", async () => {
    // ids 1..3 in category 2, id 4 in category 3
    db = await createTestDb([q(2), q(2), q(2), q(3)]);
    const quiz = new QuizServiceImpl(new QuestionRepositorySqlite(db));
    const next = await quiz.nextQuestion({ previousQuestions: [1, 2, 3], categoryId: 2 });
    expect(next).toBeNull();
  });

  it("returns the only unseen question", async () => {
    // ids 1..5, only id 5 in category 4
    db = await createTestDb([q(1), q(1), q(2), q(3), q(4)]);
    const quiz = new QuizServiceImpl(new QuestionRepositorySqlite(db));
    const next = await quiz.nextQuestion({ previousQuestions: [], categoryId: 4 });
    expect(next?.id).toBe(5);
  });

  it("draws from every category for id 0", async () => {
    db = await createTestDb([q(1), q(2), q(3)]);
    const draw = vi.fn(() => 1);
    const quiz = new QuizServiceImpl(new QuestionRepositorySqlite(db), draw);
    const next = await quiz.nextQuestion({ previousQuestions: [1], categoryId: 0 });
    // candidates are ids 2 and 3
    expect(draw).toHaveBeenCalledWith(2);
    expect(next).toEqual({
      id: 3,
      question: "Question in 3",
      answer: "A",
      category: 3,
      difficulty: 1,
    });
  });

  it("returns null for an empty store", async () => {
    db = await createTestDb([]);
    const quiz = new QuizServiceImpl(new QuestionRepositorySqlite(db));
    expect(await quiz.nextQuestion({ previousQuestions: [], categoryId: 0 })).toBeNull();
  });
});
