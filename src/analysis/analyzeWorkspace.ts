import { resolve } from "node:path";
import { from, lastValueFrom } from "rxjs";
import { mergeMap, tap, toArray } from "rxjs/operators";
import { DEFAULT_CONCURRENCY } from "../config/defaults.js";
import {
  type DiscoveredProject,
  discoverProjects,
} from "../discovery/discoverProjects.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import {
  type ResolutionStats,
  resolveRelationships,
} from "../resolution/resolveRelationships.js";
import { errorMessage } from "../shared/errors.js";
import type { Entity } from "../shared/GraphTypes.js";
import { analyzeProject, type ScanError } from "./analyzeProject.js";
import { createEntityRegistry, type EntityRegistry } from "./EntityRegistry.js";

export interface AnalyzeProjectsOptions {
  /** Absolute global root */
  root: string;
  /** Maximum number of projects scanned at once (default: CPU count, minimum 2) */
  concurrency?: number;
  logger: GraphLogger;
}

export interface ProjectsAnalysis {
  /** Every scan merged; not frozen yet */
  registry: EntityRegistry;
  filesScanned: number;
  errors: ScanError[];
}

/**
 * Scan projects with bounded concurrency and merge each finished scan into a
 * fresh registry, one scan at a time.
 *
 * A project that cannot be created is logged and reported in `errors`; the
 * other projects still contribute.
 */
export const analyzeProjects = async (
  projects: readonly DiscoveredProject[],
  options: AnalyzeProjectsOptions,
): Promise<ProjectsAnalysis> => {
  const { root, logger } = options;
  const registry = createEntityRegistry();
  const errors: ScanError[] = [];
  let filesScanned = 0;

  await lastValueFrom(
    from(projects).pipe(
      mergeMap(async (project) => {
        try {
          return analyzeProject(project, { root, logger });
        } catch (e) {
          const message = `Failed to analyze project ${project.relativeManifestPath}: ${errorMessage(e)}`;
          logger.error(message);
          errors.push({ file: project.relativeManifestPath, message });
          return undefined;
        }
      }, options.concurrency ?? DEFAULT_CONCURRENCY),
      tap((scan) => {
        if (scan) {
          registry.mergeScan(scan.entities);
          filesScanned += scan.filesScanned.length;
          errors.push(...scan.errors);
        }
      }),
      toArray(),
    ),
    { defaultValue: [] },
  );

  return { registry, filesScanned, errors };
};

export interface AnalyzeWorkspaceOptions {
  manifestFileNames?: readonly string[];
  ignoreDirectories?: readonly string[];
  concurrency?: number;
  logger: GraphLogger;
}

/**
 * Result of one discover → analyze → resolve run.
 */
export interface AnalysisResult {
  /** Absolute global root */
  root: string;
  projects: DiscoveredProject[];
  /** Resolved entities, sorted by id */
  entities: Entity[];
  filesScanned: number;
  resolution: ResolutionStats;
  errors: ScanError[];
}

/**
 * Discover every project under `root`, scan them, then resolve all
 * placeholders once the full entity universe is known.
 *
 * @throws Error if the root cannot be read
 */
export const analyzeWorkspace = async (
  root: string,
  options: AnalyzeWorkspaceOptions,
): Promise<AnalysisResult> => {
  const absoluteRoot = resolve(root);
  const { logger } = options;

  const projects = discoverProjects(absoluteRoot, {
    manifestFileNames: options.manifestFileNames,
    ignoreDirectories: options.ignoreDirectories,
    logger,
  });
  if (projects.length === 0) {
    logger.warn(`No project manifests found under ${absoluteRoot}`);
  } else {
    logger.phase(
      "discover",
      `${projects.length} manifests under ${absoluteRoot}`,
    );
  }

  const { registry, filesScanned, errors } = await analyzeProjects(projects, {
    root: absoluteRoot,
    concurrency: options.concurrency,
    logger,
  });

  registry.freeze();
  logger.phase(
    "resolve",
    `${registry.size} entities from ${projects.length} manifests`,
  );
  const resolution = resolveRelationships(registry, logger);

  const entities = registry
    .entities()
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  return {
    root: absoluteRoot,
    projects,
    entities,
    filesScanned,
    resolution,
    errors,
  };
};
