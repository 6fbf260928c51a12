import { isAbsolute, resolve } from "node:path";
import type {
  Neo4jStorageConfig,
  StorageConfig,
} from "../config/Config.schemas.js";
import { getDefaultDbPath } from "../config/getCacheDir.js";
import { createBoltWriter } from "./bolt/createBoltWriter.js";
import {
  createNeo4jRunner,
  type Neo4jConnectionOptions,
} from "./bolt/createNeo4jRunner.js";
import type { GraphWriter } from "./GraphWriter.js";
import { createSqliteWriter } from "./sqlite/createSqliteWriter.js";
import { openDatabase } from "./sqlite/sqliteConnection.utils.js";

const DEFAULT_BOLT_URI = "bolt://localhost:7687";
const DEFAULT_BOLT_USERNAME = "neo4j";

/**
 * Fill unset Bolt settings from NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD.
 */
export const resolveNeo4jOptions = (
  storage: Neo4jStorageConfig,
  env: NodeJS.ProcessEnv = process.env,
): Neo4jConnectionOptions => ({
  uri: storage.uri ?? env.NEO4J_URI ?? DEFAULT_BOLT_URI,
  username: storage.username ?? env.NEO4J_USERNAME ?? DEFAULT_BOLT_USERNAME,
  password: storage.password ?? env.NEO4J_PASSWORD ?? "",
  database: storage.database,
});

/**
 * Absolute SQLite path for a storage config: an explicit override first,
 * then the configured path (relative to the root), then the default cache
 * location.
 */
export const resolveSqlitePath = (
  root: string,
  storage: StorageConfig | undefined,
  dbPathOverride?: string,
): string => {
  const configured =
    dbPathOverride ?? (storage?.type === "sqlite" ? storage.path : undefined);
  if (configured === undefined) {
    return getDefaultDbPath(root);
  }
  return isAbsolute(configured) ? configured : resolve(root, configured);
};

export interface CreateGraphWriterOptions {
  /** Absolute analyzed root (anchors relative database paths) */
  root: string;
  storage?: StorageConfig;
  /** `--db` flag; always selects SQLite */
  dbPath?: string;
}

/**
 * Open the store the configuration names (SQLite unless told otherwise).
 *
 * @throws StoreConnectionError if a SQLite file cannot be opened
 */
export const createGraphWriter = (
  options: CreateGraphWriterOptions,
): GraphWriter => {
  const { storage } = options;
  if (storage?.type === "neo4j" && options.dbPath === undefined) {
    return createBoltWriter(createNeo4jRunner(resolveNeo4jOptions(storage)));
  }

  const path = resolveSqlitePath(options.root, storage, options.dbPath);
  return createSqliteWriter(openDatabase({ path }));
};
