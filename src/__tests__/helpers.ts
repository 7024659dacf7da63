/**
 * Test helpers: an in-memory store with a fixed set of categories and
 * questions, and an app wired to it.
 */

import type { Hono } from "hono";
import { z } from "zod";
import { MEMORY_DB, openDb, type SqliteClient } from "../db/sqlite.js";
import { seedDatabase } from "../db/seed.js";
import type { CategoryRow, NewQuestion } from "../domain/types.js";
import { createApp } from "../http/app.js";
import { createServices, type ServiceOptions } from "../services/services.js";

export const CATEGORIES: CategoryRow[] = [
  { id: 1, type: "Science" },
  { id: 2, type: "Art" },
  { id: 3, type: "Geography" },
  { id: 4, type: "History" },
  { id: 5, type: "Entertainment" },
  { id: 6, type: "Sports" }, // no questions reference this one
];

// ids 1..12 in this order once inserted into an empty store
export const QUESTIONS: NewQuestion[] = [
  { question: "What is the Capital of France?", answer: "Paris", category: 3, difficulty: 1 },
  { question: "What is the boiling point of water in Celsius?", answer: "100", category: 1, difficulty: 1 },
  { question: "Who painted the Mona Lisa?", answer: "Leonardo da Vinci", category: 2, difficulty: 2 },
  { question: "Which element has atomic number 1?", answer: "Hydrogen", category: 1, difficulty: 2 },
  { question: "What is the capital city of Japan?", answer: "Tokyo", category: 3, difficulty: 2 },
  { question: "Who wrote the play Hamlet?", answer: "William Shakespeare", category: 5, difficulty: 2 },
  { question: "In which year did the First World War begin?", answer: "1914", category: 4, difficulty: 3 },
  { question: "What is the largest ocean on Earth?", answer: "Pacific", category: 3, difficulty: 1 },
  { question: "Which artist painted The Starry Night?", answer: "Vincent van Gogh", category: 2, difficulty: 2 },
  { question: "Who was the first person to walk on the Moon?", answer: "Neil Armstrong", category: 4, difficulty: 1 },
  { question: "What planet is known as the Red Planet?", answer: "Mars", category: 1, difficulty: 1 },
  { question: "Which film features a clownfish named Nemo?", answer: "Finding Nemo", category: 5, difficulty: 1 },
];

export async function createTestDb(
  questions: NewQuestion[] = QUESTIONS
): Promise<SqliteClient> {
  const db = await openDb(MEMORY_DB);
  await seedDatabase(db, { categories: CATEGORIES, questions });
  return db;
}

export async function createTestApp(
  options: ServiceOptions & { questions?: NewQuestion[] } = {}
): Promise<{ app: Hono; db: SqliteClient }> {
  const db = await createTestDb(options.questions);
  const app = createApp(createServices(db, { randomIndex: options.randomIndex }));
  return { app, db };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

const QuestionJson = z.object({
  id: z.number().int(),
  question: z.string(),
  answer: z.string(),
  category: z.number().int(),
  difficulty: z.number().int(),
});

/** Shape shared by every endpoint that answers with a page of questions. */
export const QuestionListJson = z.object({
  success: z.literal(true),
  questions: z.array(QuestionJson),
  total_questions: z.number().int(),
  currentCategory: z.union([z.array(z.number().int()), z.number().int()]).optional(),
  categories: z.record(z.string()).optional(),
  created: z.number().int().optional(),
  deleted: z.number().int().optional(),
});

export const QuizJson = z.object({
  success: z.literal(true),
  question: QuestionJson.nullable(),
});

/** Parses a response body, failing the test when it has the wrong shape. */
export async function readJson<S extends z.ZodTypeAny>(
  res: Response,
  schema: S
): Promise<z.output<S>> {
  return schema.parse(await res.json());
}

export const idsOf = (rows: Array<{ id: number }>): number[] => rows.map((r) => r.id);
