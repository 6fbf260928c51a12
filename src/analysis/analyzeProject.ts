import { dirname, isAbsolute, relative } from "node:path";
import type { SourceFile, ts } from "ts-morph";
import type { DiscoveredProject } from "../discovery/discoverProjects.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import { errorMessage } from "../shared/errors.js";
import type { Entity, Properties } from "../shared/GraphTypes.js";
import { createProject } from "./createProject.js";
import { extractFromSourceFile } from "./extract/extractFromSourceFile.js";
import type { FileAnalysisContext } from "./extract/FileAnalysisContext.js";
import { resolvedRelationship } from "./extract/relationships.js";
import { generateFileId } from "./generateEntityId.js";
import { normalizePath } from "./normalizePath.js";

/**
 * Non-fatal failure attached to a scan or a run.
 */
export interface ScanError {
  /** Root-relative path of the file or manifest */
  file: string;
  message: string;
}

/**
 * Everything one project contributed. Owns no shared state.
 */
export interface ProjectScan {
  project: DiscoveredProject;
  /** Project entity first, then per-file entities in file order */
  entities: Entity[];
  /** Root-relative paths of the scanned files */
  filesScanned: string[];
  errors: ScanError[];
}

export interface AnalyzeProjectOptions {
  /** Absolute global root */
  root: string;
  logger: GraphLogger;
}

const isOutsideRoot = (relativePath: string): boolean =>
  relativePath.startsWith("..") || isAbsolute(relativePath);

/**
 * Directory `paths` targets are relative to: `baseUrl`, else the directory of
 * the config that declares `paths` (possibly an `extends` base), else the
 * manifest directory.
 */
export const aliasBaseDir = (
  compilerOptions: ts.CompilerOptions,
  manifestPath: string,
): string => {
  if (compilerOptions.baseUrl) {
    return compilerOptions.baseUrl;
  }
  // Set by the compiler's config parser, absent from the public typings
  const { pathsBasePath } = compilerOptions;
  return typeof pathsBasePath === "string"
    ? pathsBasePath
    : dirname(manifestPath);
};

const projectEntity = (
  project: DiscoveredProject,
  filesScanned: readonly string[],
): Entity => {
  const properties: Properties = { fileCount: filesScanned.length };
  if (project.files) {
    properties.files = project.files;
  }
  if (project.include) {
    properties.include = project.include;
  }

  const directory = dirname(project.relativeManifestPath);

  return {
    id: project.relativeManifestPath,
    kind: "Project",
    name: directory === "." ? project.relativeManifestPath : directory,
    filePath: project.relativeManifestPath,
    properties,
    relationships: filesScanned.map((filePath) =>
      resolvedRelationship("CONTAINS", generateFileId(filePath)),
    ),
  };
};

/**
 * Scan the files of one manifest.
 *
 * Declaration files and files outside the global root are skipped silently.
 * A failing file is skipped with a warning; the rest of the project still
 * contributes.
 *
 * @throws Error when the manifest cannot be turned into a project
 */
export const analyzeProject = (
  project: DiscoveredProject,
  options: AnalyzeProjectOptions,
): ProjectScan => {
  const { root, logger } = options;
  const tsProject = createProject({ tsConfigFilePath: project.manifestPath });
  const compilerOptions = tsProject.getCompilerOptions();
  const pathsBaseDir = aliasBaseDir(compilerOptions, project.manifestPath);

  const members: Array<{ sourceFile: SourceFile; filePath: string }> = [];
  for (const sourceFile of tsProject.getSourceFiles()) {
    const absolutePath = sourceFile.getFilePath();
    const relativePath = relative(root, absolutePath);
    if (
      sourceFile.isDeclarationFile() ||
      isOutsideRoot(relativePath) ||
      absolutePath.includes("/node_modules/")
    ) {
      continue;
    }
    members.push({ sourceFile, filePath: normalizePath(relativePath) });
  }

  const entities: Entity[] = [];
  const filesScanned: string[] = [];
  const errors: ScanError[] = [];

  logger.startProgress(members.length, project.relativeManifestPath);

  for (const { sourceFile, filePath } of members) {
    const context: FileAnalysisContext = {
      filePath,
      root,
      paths: compilerOptions.paths,
      pathsBaseDir,
    };

    try {
      const result = extractFromSourceFile(sourceFile, context);
      entities.push(...result.entities);
      filesScanned.push(filePath);
      for (const warning of result.warnings) {
        logger.warn(warning);
      }
    } catch (e) {
      const message = `Failed to analyze ${filePath}: ${errorMessage(e)}`;
      logger.warn(message);
      errors.push({ file: filePath, message });
    }

    logger.updateProgress(filesScanned.length + errors.length);
  }

  const scanEntities = [projectEntity(project, filesScanned), ...entities];
  logger.completeProgress(filesScanned.length, scanEntities.length);

  return { project, entities: scanEntities, filesScanned, errors };
};
