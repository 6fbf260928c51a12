import type { SourceFile } from "ts-morph";
import type { Entity, Relationship } from "../../shared/GraphTypes.js";
import { generateFileId } from "../generateEntityId.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";

/**
 * Extract the file entity of a source file, carrying its IMPORTS.
 */
export const extractFileEntity = (
  sourceFile: SourceFile,
  context: FileAnalysisContext,
  imports: Relationship[],
): Entity => ({
  id: generateFileId(context.filePath),
  kind: "File",
  name: sourceFile.getBaseName(),
  filePath: context.filePath,
  properties: {
    extension: sourceFile.getExtension(),
    startLine: 1,
    endLine: sourceFile.getEndLineNumber(),
  },
  relationships: imports,
});
