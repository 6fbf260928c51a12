import type { SourceFile } from "ts-morph";
import type { Entity, Properties } from "../../shared/GraphTypes.js";
import { generateEntityId, generateFileId } from "../generateEntityId.js";
import type { FileAnalysisContext } from "./FileAnalysisContext.js";
import { resolvedRelationship } from "./relationships.js";

/**
 * Extract interface entities from a source file.
 */
export const extractInterfaceEntities = (
  sourceFile: SourceFile,
  context: FileAnalysisContext,
): Entity[] =>
  sourceFile.getInterfaces().map((interfaceDecl) => {
    const name = interfaceDecl.getName();
    const properties: Properties = {
      exported: interfaceDecl.isExported(),
      startLine: interfaceDecl.getStartLineNumber(),
      endLine: interfaceDecl.getEndLineNumber(),
    };

    const extendsNames = interfaceDecl
      .getExtends()
      .map((clause) => clause.getExpression().getText());
    if (extendsNames.length > 0) {
      properties.extends = extendsNames;
    }

    return {
      id: generateEntityId(context.filePath, name),
      kind: "Interface",
      name,
      filePath: context.filePath,
      properties,
      relationships: [
        resolvedRelationship("DEFINED_IN", generateFileId(context.filePath)),
      ],
    };
  });
