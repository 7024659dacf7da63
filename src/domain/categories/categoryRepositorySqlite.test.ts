import { describe, it, expect, afterEach } from "vitest";
import { MEMORY_DB, openDb, type SqliteClient } from "../../db/sqlite.js";
import { createTestDb } from "../../__tests__/helpers.js";
import { CategoryRepositorySqlite } from "./categoryRepositorySqlite.js";

describe("CategoryRepositorySqlite", () => {
  let db: SqliteClient;

  afterEach(async () => {
    await db.close();
  });

  it("lists categories ordered by id", async () => {
    db = await createTestDb();
    const repo = new CategoryRepositorySqlite(db);
    const rows = await repo.listAll();
    expect(rows.map((r) => r.id)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(rows[1]).toEqual({ id: 2, type: "Art" });
    expect(await repo.count()).toBe(6);
  });

  it("returns nothing for an empty store", async () => {
    db = await openDb(MEMORY_DB);
    const repo = new CategoryRepositorySqlite(db);
    expect(await repo.listAll()).toEqual([]);
    expect(await repo.count()).toBe(0);
  });
});
