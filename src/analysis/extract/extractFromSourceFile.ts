import type { SourceFile } from "ts-morph";
import type { Entity } from "../../shared/GraphTypes.js";
import { extractClassEntities } from "./extractClassEntities.js";
import { extractFileEntity } from "./extractFileEntity.js";
import { extractImportRelationships } from "./extractImportRelationships.js";
import { extractInterfaceEntities } from "./extractInterfaceEntities.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";

export type { FileAnalysisContext };

/**
 * Result from analyzing one source file.
 */
export interface FileExtractionResult {
  /** File entity first, then declarations and their members */
  entities: Entity[];
  /** Non-fatal diagnostics (dropped imports) */
  warnings: string[];
}

/**
 * Extract every entity of a ts-morph SourceFile.
 */
export const extractFromSourceFile = (
  sourceFile: SourceFile,
  context: FileAnalysisContext,
): FileExtractionResult => {
  const imports = extractImportRelationships(sourceFile, context);

  const entities = [
    extractFileEntity(sourceFile, context, imports.relationships),
    ...extractClassEntities(sourceFile, context),
    ...extractInterfaceEntities(sourceFile, context),
  ];

  return { entities, warnings: imports.warnings };
};
