import type Database from "better-sqlite3";
import {
  DB_SCHEMA_VERSION,
  getDbSchemaVersion,
  setDbSchemaVersion,
} from "../versions.js";

/**
 * SQLite schema for the property graph.
 *
 * Tables:
 * - nodes: All entity kinds (discriminated by 'kind' column)
 * - edges: All relationship types, one row per (source, target, type)
 *
 * Node and edge properties are stored as JSON objects.
 */

const NODES_TABLE = `
CREATE TABLE IF NOT EXISTS nodes (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL,
  name TEXT NOT NULL,
  file_path TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}'
)`;

const EDGES_TABLE = `
CREATE TABLE IF NOT EXISTS edges (
  source TEXT NOT NULL,
  target TEXT NOT NULL,
  type TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  PRIMARY KEY (source, target, type)
)`;

const INDEXES = [
  // Node indexes
  "CREATE INDEX IF NOT EXISTS idx_nodes_kind ON nodes(kind)",
  "CREATE INDEX IF NOT EXISTS idx_nodes_name ON nodes(name)",
  "CREATE INDEX IF NOT EXISTS idx_nodes_file_path ON nodes(file_path)",

  // Edge indexes for traversal queries
  "CREATE INDEX IF NOT EXISTS idx_edges_source ON edges(source)",
  "CREATE INDEX IF NOT EXISTS idx_edges_target ON edges(target)",
  "CREATE INDEX IF NOT EXISTS idx_edges_type ON edges(type)",
];

/**
 * Initialize the schema on a database connection.
 * Creates tables and indexes if they don't exist. A database written with
 * another schema version is dropped and recreated.
 */
export const initializeSchema = (db: Database.Database): void => {
  if (getDbSchemaVersion(db) !== DB_SCHEMA_VERSION) {
    dropAllTables(db);
  }
  setDbSchemaVersion(db);

  db.exec(NODES_TABLE);
  db.exec(EDGES_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

/**
 * Drop all tables (for clearAll operation).
 */
export const dropAllTables = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS edges");
  db.exec("DROP TABLE IF EXISTS nodes");
};
