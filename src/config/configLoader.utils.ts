import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type GraphConfig, GraphConfigSchema } from "./Config.schemas.js";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_IGNORE_DIRECTORIES,
  DEFAULT_MANIFEST_FILE_NAMES,
} from "./defaults.js";

/**
 * Supported config file name.
 */
export const CONFIG_FILE_NAME = "structgraph.config.json" as const;

/**
 * Config with every optional setting filled in.
 * Storage stays optional: the CLI picks the default database path.
 */
export interface ResolvedGraphConfig {
  manifestFileNames: string[];
  ignoreDirectories: string[];
  concurrency: number;
  storage?: GraphConfig["storage"];
}

/**
 * Find a config file in the given directory.
 *
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): GraphConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return GraphConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig.
 */
export const loadConfig = (configPath: string): GraphConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(content);
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }
};

/**
 * Fill in defaults for every unset setting.
 */
export const resolveConfig = (config: GraphConfig): ResolvedGraphConfig => ({
  manifestFileNames: config.manifestFileNames ?? [
    ...DEFAULT_MANIFEST_FILE_NAMES,
  ],
  ignoreDirectories: config.ignoreDirectories ?? [
    ...DEFAULT_IGNORE_DIRECTORIES,
  ],
  concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
  storage: config.storage,
});

/**
 * Result of loading config.
 */
export type ConfigResult =
  | { config: ResolvedGraphConfig; source: "explicit"; configPath: string }
  | { config: ResolvedGraphConfig; source: "default" };

/**
 * Load config from a directory, falling back to defaults when the directory
 * has no config file.
 *
 * @throws Error if a config file exists but is invalid
 */
export const loadConfigOrDefault = (directory: string): ConfigResult => {
  const configPath = findConfigFile(directory);
  if (configPath) {
    return {
      config: resolveConfig(loadConfig(configPath)),
      source: "explicit",
      configPath,
    };
  }

  return { config: resolveConfig({}), source: "default" };
};
