import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { InvalidDocumentError } from "../shared/errors.js";
import { PropertiesSchema } from "../shared/GraphSchemas.js";
import {
  ENTITY_KINDS,
  type Entity,
  KIND_HINTS,
  RELATIONSHIP_TYPES,
} from "../shared/GraphTypes.js";

export const ANALYSIS_DOCUMENT_VERSION = 1;

// --- Schemas ---

const RelationshipTargetSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("resolved"), id: z.string().min(1) }),
  z.object({
    status: z.literal("placeholder"),
    hint: z.enum(KIND_HINTS),
    name: z.string().min(1),
  }),
  z.object({
    status: z.literal("file"),
    path: z.string().min(1),
    specifier: z.string(),
  }),
  z.object({ status: z.literal("external"), specifier: z.string() }),
  z.object({ status: z.literal("unresolved"), name: z.string() }),
  z.object({
    status: z.literal("ambiguous"),
    name: z.string(),
    candidates: z.array(z.string()),
  }),
]);

const RelationshipSchema = z.object({
  type: z.enum(RELATIONSHIP_TYPES),
  target: RelationshipTargetSchema,
  properties: PropertiesSchema.optional(),
});

const EntitySchema = z.object({
  id: z.string().min(1),
  kind: z.enum(ENTITY_KINDS),
  name: z.string(),
  filePath: z.string(),
  properties: PropertiesSchema,
  relationships: z.array(RelationshipSchema),
});

export const AnalysisDocumentSchema = z.object({
  version: z.literal(ANALYSIS_DOCUMENT_VERSION),
  /** Absolute root the entity paths are relative to */
  root: z.string(),
  /** ISO timestamp */
  generatedAt: z.string(),
  entities: z.array(EntitySchema),
});

export type AnalysisDocument = z.infer<typeof AnalysisDocumentSchema>;

// --- Operations ---

export const createAnalysisDocument = (
  root: string,
  entities: Entity[],
  generatedAt: Date = new Date(),
): AnalysisDocument => ({
  version: ANALYSIS_DOCUMENT_VERSION,
  root,
  generatedAt: generatedAt.toISOString(),
  entities,
});

export const serializeAnalysisDocument = (document: AnalysisDocument): string =>
  `${JSON.stringify(document, null, 2)}\n`;

/**
 * Parse and validate document text.
 *
 * @param source - Name used in error messages (usually the file path)
 * @throws InvalidDocumentError if the text is not JSON or fails validation
 */
export const parseAnalysisDocument = (
  content: string,
  source: string,
): AnalysisDocument => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new InvalidDocumentError(`Invalid JSON in analysis document ${source}`, {
      cause: e,
    });
  }

  const result = AnalysisDocumentSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const detail = issue
      ? `${issue.path.join(".") || "<root>"}: ${issue.message}`
      : "unknown issue";
    throw new InvalidDocumentError(
      `Invalid analysis document ${source} (${detail})`,
      { cause: result.error },
    );
  }

  return result.data;
};

/**
 * @throws InvalidDocumentError if the file cannot be read or is invalid
 */
export const readAnalysisDocument = (path: string): AnalysisDocument => {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    throw new InvalidDocumentError(`Cannot read analysis document ${path}`, {
      cause: e,
    });
  }
  return parseAnalysisDocument(content, path);
};

export const writeAnalysisDocument = (
  path: string,
  document: AnalysisDocument,
): void => {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serializeAnalysisDocument(document));
};
