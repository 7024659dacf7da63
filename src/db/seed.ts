import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { SqliteClient } from "./sqlite.js";
import { logger } from "../logger.js";

/* -------------------------------- schema -------------------------------- */

const CategorySchema = z.object({
  id: z.number().int().positive(),
  type: z.string().min(1),
});

const QuestionSchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  category: z.number().int(),
  difficulty: z.number().int().min(1).max(5),
});

export const SeedSchema = z.object({
  categories: z.array(CategorySchema),
  questions: z.array(QuestionSchema).default([]),
});

export type SeedData = z.infer<typeof SeedSchema>;

export interface SeedStats {
  categories: number;
  questions: number;
}

export function readSeedFile(filePath: string): SeedData {
  const raw = fs.readFileSync(path.resolve(filePath), "utf8");
  return SeedSchema.parse(JSON.parse(raw));
}

/**
 * Inserts missing categories, and the seed questions only when the questions
 * table is empty, so restarts never duplicate them.
 */
export async function seedDatabase(
  db: SqliteClient,
  data: SeedData
): Promise<SeedStats> {
  return db.transaction(async () => {
    let categories = 0;
    for (const c of data.categories) {
      const { changes } = await db.run(
        `INSERT OR IGNORE INTO categories (id, type) VALUES (?, ?)`,
        [c.id, c.type]
      );
      categories += changes;
    }

    let questions = 0;
    const existing = await db.get<{ c: number }>(
      `SELECT COUNT(*) AS c FROM questions`
    );
    if ((existing?.c ?? 0) === 0) {
      for (const q of data.questions) {
        await db.run(
          `INSERT INTO questions (question, answer, category, difficulty)
           VALUES (?, ?, ?, ?)`,
          [q.question, q.answer, q.category, q.difficulty]
        );
        questions++;
      }
    }

    return { categories, questions };
  });
}

export async function seedFromFile(
  db: SqliteClient,
  filePath: string
): Promise<SeedStats | null> {
  if (!fs.existsSync(path.resolve(filePath))) {
    logger.warn(`Seed file ${filePath} not found; skipping seed`);
    return null;
  }
  const stats = await seedDatabase(db, readSeedFile(filePath));
  logger.info(
    `Seed: categories inserted=${stats.categories}, questions inserted=${stats.questions}`
  );
  return stats;
}
