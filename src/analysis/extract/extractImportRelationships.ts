import { relative } from "node:path";
import type { SourceFile } from "ts-morph";
import type { Properties, Relationship } from "../../shared/GraphTypes.js";
import { normalizePath } from "../normalizePath.js";
import {
  isRelativeSpecifier,
  resolveImportPath,
} from "../resolveImportPath.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";

export interface ImportExtractionResult {
  relationships: Relationship[];
  /** Relative imports that could not be resolved (dropped) */
  warnings: string[];
}

interface ImportLike {
  specifier: string;
  typeOnly: boolean;
  reexport: boolean;
}

const collectImportLikes = (sourceFile: SourceFile): ImportLike[] => {
  const imports: ImportLike[] = sourceFile
    .getImportDeclarations()
    .map((declaration) => ({
      specifier: declaration.getModuleSpecifierValue(),
      typeOnly: declaration.isTypeOnly(),
      reexport: false,
    }));

  for (const declaration of sourceFile.getExportDeclarations()) {
    const specifier = declaration.getModuleSpecifierValue();
    if (specifier !== undefined) {
      imports.push({
        specifier,
        typeOnly: declaration.isTypeOnly(),
        reexport: true,
      });
    }
  }

  return imports;
};

/**
 * Extract IMPORTS relationships from the top-level import and
 * `export … from` declarations of a file.
 *
 * Resolved paths become `file` targets, looked up among the scanned files
 * once every project is known. Unresolved bare specifiers become `external`
 * markers. Unresolved relative specifiers are dropped with a warning.
 */
export const extractImportRelationships = (
  sourceFile: SourceFile,
  context: FileAnalysisContext,
): ImportExtractionResult => {
  const project = sourceFile.getProject();
  const fileSystem = project.getFileSystem();
  const fileExists = (absolutePath: string): boolean =>
    project.getSourceFile(absolutePath) !== undefined ||
    fileSystem.fileExistsSync(absolutePath);

  const relationships: Relationship[] = [];
  const warnings: string[] = [];

  for (const { specifier, typeOnly, reexport } of collectImportLikes(
    sourceFile,
  )) {
    const properties: Properties = reexport
      ? { from: specifier, typeOnly, reexport }
      : { from: specifier, typeOnly };

    const resolvedPath = resolveImportPath(specifier, {
      importingFilePath: sourceFile.getFilePath(),
      root: context.root,
      paths: context.paths,
      pathsBaseDir: context.pathsBaseDir,
      fileExists,
    });

    if (resolvedPath !== undefined) {
      relationships.push({
        type: "IMPORTS",
        target: {
          status: "file",
          path: normalizePath(relative(context.root, resolvedPath)),
          specifier,
        },
        properties,
      });
    } else if (!isRelativeSpecifier(specifier)) {
      relationships.push({
        type: "IMPORTS",
        target: { status: "external", specifier },
        properties,
      });
    } else {
      warnings.push(
        `Could not resolve import "${specifier}" in ${context.filePath}. Dropping.`,
      );
    }
  }

  return { relationships, warnings };
};
