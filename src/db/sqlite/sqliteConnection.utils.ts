import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { errorMessage, StoreConnectionError } from "../../shared/errors.js";
import { initializeSchema } from "./sqliteSchema.utils.js";

export interface SqliteConnectionOptions {
  /** Path to the database file. Use ':memory:' for in-memory database. */
  path: string;
}

/**
 * Open or create a SQLite database connection and bring its schema up to
 * date.
 *
 * @throws StoreConnectionError if the file cannot be opened
 */
export const openDatabase = (
  options: SqliteConnectionOptions,
): Database.Database => {
  const { path } = options;
  const inMemory = path === ":memory:";

  try {
    if (!inMemory) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);

    if (!inMemory) {
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
    }
    db.pragma("cache_size = -64000"); // 64MB cache

    initializeSchema(db);
    return db;
  } catch (e) {
    throw new StoreConnectionError(
      `Cannot open SQLite database ${path}: ${errorMessage(e)}`,
      { cause: e },
    );
  }
};

/**
 * Close the database connection.
 */
export const closeDatabase = (db: Database.Database): void => {
  db.close();
};
