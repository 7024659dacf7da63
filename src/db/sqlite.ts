import sqlite3 from "sqlite3";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { logger } from "../logger.js";

export const MEMORY_DB = ":memory:";

export interface RunResult {
  lastID: number;
  changes: number;
}

/**
 * Promise wrapper around a single sqlite3 connection. One instance is created
 * at boot and handed to every repository.
 */
export class SqliteClient {
  private readonly db: sqlite3.Database;

  public constructor(db: sqlite3.Database) {
    this.db = db;
  }

  public get<T>(
    sql: string,
    params: readonly unknown[] = []
  ): Promise<T | undefined> {
    return new Promise<T | undefined>((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: T | undefined) =>
        err ? reject(err) : resolve(row)
      );
    });
  }

  public all<T>(sql: string, params: readonly unknown[] = []): Promise<T[]> {
    return new Promise<T[]>((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) =>
        err ? reject(err) : resolve(rows)
      );
    });
  }

  public run(sql: string, params: readonly unknown[] = []): Promise<RunResult> {
    return new Promise<RunResult>((resolve, reject) => {
      this.db.run(
        sql,
        params,
        function (this: sqlite3.RunResult, err: Error | null): void {
          if (err) {
            reject(err);
            return;
          }
          resolve({ lastID: this.lastID, changes: this.changes });
        }
      );
    });
  }

  public exec(sql: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.db.exec(sql, (err: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  /** Runs `work` inside BEGIN/COMMIT, rolling back when it throws. */
  public async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.run("BEGIN");
    try {
      const result = await work();
      await this.run("COMMIT");
      return result;
    } catch (e) {
      await this.run("ROLLBACK");
      throw e;
    }
  }

  public async tableExists(name: string): Promise<boolean> {
    const row = await this.get<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type='table' AND name=? LIMIT 1`,
      [name]
    );
    return !!row;
  }

  public close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.db.close((err: Error | null) => (err ? reject(err) : resolve()));
    });
  }
}

export async function openDb(dbFile: string): Promise<SqliteClient> {
  const inMemory = dbFile === MEMORY_DB;
  if (!inMemory) {
    const dir = path.dirname(dbFile);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const client = new SqliteClient(await connect(dbFile));

  if (!inMemory) await client.exec("PRAGMA journal_mode = WAL;");

  // Auto-apply schema if questions table doesn't exist
  if (!(await client.tableExists("questions"))) {
    const schemaPath = locateSchemaPath();
    await client.exec(fs.readFileSync(schemaPath, "utf8"));
    logger.info(`Applied schema from ${schemaPath}`);
  } else {
    logger.info(`SQLite ready at ${dbFile} (schema already present)`);
  }

  return client;
}

function connect(dbFile: string): Promise<sqlite3.Database> {
  return new Promise<sqlite3.Database>((resolve, reject) => {
    const db: sqlite3.Database = new sqlite3.Database(
      dbFile,
      (err: Error | null) => (err ? reject(err) : resolve(db))
    );
  });
}

function locateSchemaPath(): string {
  // Beside this module: src/db under vitest, dist/db when the build copied it
  const here = path.dirname(fileURLToPath(import.meta.url));
  const besideCandidate = path.resolve(here, "schema.sql");
  if (fs.existsSync(besideCandidate)) return besideCandidate;

  // Fallback: dev path from project root
  const devCandidate = path.resolve(process.cwd(), "src", "db", "schema.sql");
  if (fs.existsSync(devCandidate)) return devCandidate;

  throw new Error("schema.sql not found in dist/db or src/db");
}
