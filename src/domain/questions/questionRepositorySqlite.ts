import type { SqliteClient } from "../../db/sqlite.js";
import type { NewQuestion, QuestionRow } from "../types.js";
import type { QuestionRepository } from "./questionRepository.js";

const COLUMNS = `id, question, answer, category, difficulty`;

export class QuestionRepositorySqlite implements QuestionRepository {
  private readonly db: SqliteClient;

  public constructor(db: SqliteClient) {
    this.db = db;
  }

  public listAll(): Promise<QuestionRow[]> {
    return this.db.all<QuestionRow>(
      `SELECT ${COLUMNS} FROM questions ORDER BY id`
    );
  }

  public async search(term: string): Promise<QuestionRow[]> {
    // SQLite's lower() folds ASCII only, so matching happens here
    const needle = term.toLowerCase();
    const rows = await this.listAll();
    return rows.filter((r) => r.question.toLowerCase().includes(needle));
  }

  public listByCategory(categoryId: number): Promise<QuestionRow[]> {
    return this.db.all<QuestionRow>(
      `SELECT ${COLUMNS} FROM questions WHERE category = ? ORDER BY id`,
      [categoryId]
    );
  }

  public async listExcluding(
    excludeIds: readonly number[],
    categoryId?: number
  ): Promise<QuestionRow[]> {
    const rows =
      categoryId === undefined
        ? await this.listAll()
        : await this.listByCategory(categoryId);
    // filtered in memory: one bound variable per id would hit SQLite's limit
    const seen = new Set<number>(excludeIds);
    return rows.filter((r) => !seen.has(r.id));
  }

  public async isCategoryInUse(categoryId: number): Promise<boolean> {
    const row = await this.db.get<{ id: number }>(
      `SELECT id FROM questions WHERE category = ? LIMIT 1`,
      [categoryId]
    );
    return !!row;
  }

  public async insert(q: NewQuestion): Promise<number> {
    const { lastID } = await this.db.run(
      `INSERT INTO questions (question, answer, category, difficulty)
       VALUES (?, ?, ?, ?)`,
      [q.question, q.answer, q.category, q.difficulty]
    );
    return lastID;
  }

  public async deleteById(id: number): Promise<boolean> {
    const { changes } = await this.db.run(`DELETE FROM questions WHERE id = ?`, [
      id,
    ]);
    return changes > 0;
  }

  public async count(): Promise<number> {
    const row = await this.db.get<{ c: number }>(
      `SELECT COUNT(*) AS c FROM questions`
    );
    return row?.c ?? 0;
  }
}
