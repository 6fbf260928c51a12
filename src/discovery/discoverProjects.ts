import { type Dirent, readdirSync, readFileSync } from "node:fs";
import { join, relative } from "node:path";
import { ts } from "ts-morph";
import { z } from "zod";
import { normalizePath } from "../analysis/normalizePath.js";
import {
  DEFAULT_IGNORE_DIRECTORIES,
  DEFAULT_MANIFEST_FILE_NAMES,
} from "../config/defaults.js";
import type { GraphLogger } from "../logging/GraphLogger.js";

/**
 * A compilation-unit manifest that declares its member files.
 */
export interface DiscoveredProject {
  /** Absolute path to the manifest */
  manifestPath: string;
  /** Manifest path relative to the discovery root, `/` separators */
  relativeManifestPath: string;
  /** Explicit member file list, when declared */
  files?: string[];
  /** Include patterns, when declared */
  include?: string[];
}

export interface DiscoverProjectsOptions {
  /** Manifest file names to look for (default: tsconfig.json, tsconfig.app.json) */
  manifestFileNames?: readonly string[];
  /** Directory names to skip (default: node_modules, .git, dist, ...) */
  ignoreDirectories?: readonly string[];
  logger: GraphLogger;
}

/**
 * Only the member-file fields matter here; compiler options are read by the
 * analyzer through the compiler's own config parser (which follows `extends`).
 */
const ManifestSchema = z
  .object({
    files: z.array(z.string()).optional(),
    include: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * Parse manifest text the way the compiler does (comments and trailing
 * commas allowed).
 *
 * @returns The member-file fields, or an error message
 */
export const parseManifest = (
  fileName: string,
  text: string,
):
  | { ok: true; files?: string[]; include?: string[] }
  | { ok: false; message: string } => {
  const parsed = ts.parseConfigFileTextToJson(fileName, text);
  if (parsed.error) {
    return {
      ok: false,
      message: ts.flattenDiagnosticMessageText(
        parsed.error.messageText,
        "\n",
      ),
    };
  }

  const rawConfig: unknown = parsed.config;
  const result = ManifestSchema.safeParse(rawConfig);
  if (!result.success) {
    return {
      ok: false,
      message: result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
    };
  }

  return { ok: true, files: result.data.files, include: result.data.include };
};

/**
 * Recursively find every manifest under `root` that declares a file list or
 * include patterns.
 *
 * Unreadable or invalid manifests, and manifests declaring neither `files`
 * nor `include`, are skipped with a warning. Finding nothing is not an error.
 *
 * @example
 * discoverProjects("/repo", { logger })
 * // => [
 * //   { relativeManifestPath: "apps/admin/tsconfig.app.json", include: ["src/**\/*.ts"], ... },
 * //   { relativeManifestPath: "apps/web/tsconfig.app.json", files: ["src/main.ts"], ... },
 * // ]
 */
export const discoverProjects = (
  root: string,
  options: DiscoverProjectsOptions,
): DiscoveredProject[] => {
  const manifestFileNames = new Set(
    options.manifestFileNames ?? DEFAULT_MANIFEST_FILE_NAMES,
  );
  const ignoreDirectories = new Set(
    options.ignoreDirectories ?? DEFAULT_IGNORE_DIRECTORIES,
  );
  const { logger } = options;
  const projects: DiscoveredProject[] = [];

  const visit = (directory: string, isRoot: boolean): void => {
    let entries: Dirent[];
    try {
      entries = readdirSync(directory, { withFileTypes: true });
    } catch (e) {
      // The root itself must be readable; nested failures only skip a subtree
      if (isRoot) {
        throw e;
      }
      logger.warn(
        `Could not read directory ${directory}. Skipping. (${e instanceof Error ? e.message : String(e)})`,
      );
      return;
    }

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);

      if (entry.isDirectory()) {
        if (!ignoreDirectories.has(entry.name)) {
          visit(fullPath, false);
        }
        continue;
      }

      if (!entry.isFile() || !manifestFileNames.has(entry.name)) {
        continue;
      }

      const project = readManifest(root, fullPath, logger);
      if (project) {
        projects.push(project);
      }
    }
  };

  visit(root, true);

  return projects.sort((a, b) =>
    a.relativeManifestPath.localeCompare(b.relativeManifestPath),
  );
};

const readManifest = (
  root: string,
  manifestPath: string,
  logger: GraphLogger,
): DiscoveredProject | null => {
  const relativeManifestPath = normalizePath(relative(root, manifestPath));

  let text: string;
  try {
    text = readFileSync(manifestPath, "utf-8");
  } catch (e) {
    logger.warn(
      `Could not read ${relativeManifestPath}. Skipping. (${e instanceof Error ? e.message : String(e)})`,
    );
    return null;
  }

  const parsed = parseManifest(manifestPath, text);
  if (!parsed.ok) {
    logger.warn(
      `Could not parse ${relativeManifestPath}. Skipping. (${parsed.message})`,
    );
    return null;
  }

  if (parsed.files === undefined && parsed.include === undefined) {
    logger.warn(
      `${relativeManifestPath} declares neither "files" nor "include". Skipping.`,
    );
    return null;
  }

  return {
    manifestPath,
    relativeManifestPath,
    files: parsed.files,
    include: parsed.include,
  };
};
