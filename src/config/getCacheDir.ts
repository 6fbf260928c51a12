import { mkdirSync } from "node:fs";
import { join } from "node:path";

/**
 * Cache directory name in the analyzed root.
 */
const CACHE_DIR = ".structgraph";

/**
 * Get the cache directory for structgraph.
 *
 * @param root - The analyzed root directory
 * @returns Absolute path to the cache directory
 */
export const getCacheDir = (root: string): string => {
  const cacheDir = join(root, CACHE_DIR);
  mkdirSync(cacheDir, { recursive: true });
  return cacheDir;
};

/**
 * Get the default SQLite database path for a root.
 *
 * @returns Absolute path to .structgraph/sqlite/graph.db
 */
export const getDefaultDbPath = (root: string): string => {
  const sqliteDir = join(getCacheDir(root), "sqlite");
  mkdirSync(sqliteDir, { recursive: true });
  return join(sqliteDir, "graph.db");
};
