import { cpus } from "node:os";

export const DEFAULT_MANIFEST_FILE_NAMES = [
  "tsconfig.json",
  "tsconfig.app.json",
] as const;

export const DEFAULT_IGNORE_DIRECTORIES = [
  "node_modules",
  ".git",
  "dist",
  "build",
  "coverage",
  ".angular",
  ".structgraph",
] as const;

/** Default concurrency based on CPU cores (minimum 2) */
export const DEFAULT_CONCURRENCY = Math.max(2, cpus().length);
