import type { SqliteClient } from "../../db/sqlite.js";
import type { CategoryRow } from "../types.js";
import type { CategoryRepository } from "./categoryRepository.js";

export class CategoryRepositorySqlite implements CategoryRepository {
  private readonly db: SqliteClient;

  public constructor(db: SqliteClient) {
    this.db = db;
  }

  public listAll(): Promise<CategoryRow[]> {
    return this.db.all<CategoryRow>(
      `SELECT id, type FROM categories ORDER BY id`
    );
  }

  public async count(): Promise<number> {
    const row = await this.db.get<{ c: number }>(
      `SELECT COUNT(*) AS c FROM categories`
    );
    return row?.c ?? 0;
  }
}
