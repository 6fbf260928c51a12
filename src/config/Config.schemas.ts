import { z } from "zod";

// --- Schemas ---

export const SqliteStorageSchema = z.object({
  type: z.literal("sqlite"),
  /** Path to database file, relative to the analyzed root (default: '.structgraph/sqlite/graph.db') */
  path: z.string().min(1).optional(),
});

export const Neo4jStorageSchema = z.object({
  type: z.literal("neo4j"),
  /** Bolt URI (default: NEO4J_URI or 'bolt://localhost:7687'). Memgraph speaks the same protocol. */
  uri: z.string().min(1).optional(),
  /** Username (default: NEO4J_USERNAME or 'neo4j') */
  username: z.string().optional(),
  /** Password (default: NEO4J_PASSWORD) */
  password: z.string().optional(),
  /** Database name (default: server default database) */
  database: z.string().min(1).optional(),
});

export const StorageConfigSchema = z.discriminatedUnion("type", [
  SqliteStorageSchema,
  Neo4jStorageSchema,
]);

/** Run configuration schema (structgraph.config.json) */
export const GraphConfigSchema = z.object({
  /** File names recognized as project manifests */
  manifestFileNames: z.array(z.string().min(1)).min(1).optional(),
  /** Directory names never descended into during discovery */
  ignoreDirectories: z.array(z.string().min(1)).optional(),
  /** Maximum number of projects scanned concurrently */
  concurrency: z.number().int().positive().optional(),
  /** Storage configuration (default: sqlite) */
  storage: StorageConfigSchema.optional(),
});

// --- Inferred Types ---

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type SqliteStorageConfig = z.infer<typeof SqliteStorageSchema>;
export type Neo4jStorageConfig = z.infer<typeof Neo4jStorageSchema>;
