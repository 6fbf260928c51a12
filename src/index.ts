export {
  type AnalysisDocument,
  createAnalysisDocument,
  parseAnalysisDocument,
  readAnalysisDocument,
  serializeAnalysisDocument,
  writeAnalysisDocument,
} from "./analysis/AnalysisDocument.js";
export { analyzeProject, type ScanError } from "./analysis/analyzeProject.js";
export {
  type AnalysisResult,
  type AnalyzeWorkspaceOptions,
  analyzeProjects,
  analyzeWorkspace,
} from "./analysis/analyzeWorkspace.js";
export {
  createEntityRegistry,
  type EntityRegistry,
} from "./analysis/EntityRegistry.js";
export type { GraphConfig, StorageConfig } from "./config/Config.schemas.js";
export { loadConfigOrDefault } from "./config/configLoader.utils.js";
export {
  type DiscoveredProject,
  discoverProjects,
} from "./discovery/discoverProjects.js";
export { createBoltWriter } from "./db/bolt/createBoltWriter.js";
export type { CypherRunner } from "./db/bolt/CypherRunner.js";
export { createNeo4jRunner } from "./db/bolt/createNeo4jRunner.js";
export { createGraphWriter } from "./db/createGraphWriter.js";
export type { GraphReader } from "./db/GraphReader.js";
export type { GraphWriter } from "./db/GraphWriter.js";
export { createSqliteReader } from "./db/sqlite/createSqliteReader.js";
export { createSqliteWriter } from "./db/sqlite/createSqliteWriter.js";
export {
  closeDatabase,
  openDatabase,
} from "./db/sqlite/sqliteConnection.utils.js";
export type { GraphEdge, GraphNode } from "./db/Types.js";
export {
  type LoadReport,
  loadGraph,
  type SkippedEdge,
} from "./loading/loadGraph.js";
export { consoleLogger } from "./logging/ConsoleGraphLogger.js";
export type { GraphLogger } from "./logging/GraphLogger.js";
export { silentLogger } from "./logging/SilentGraphLogger.js";
export {
  type ResolutionStats,
  resolveRelationships,
} from "./resolution/resolveRelationships.js";
export {
  InvalidDocumentError,
  RegistryFrozenError,
  StoreConnectionError,
} from "./shared/errors.js";
export { formatTarget } from "./shared/formatTarget.js";
export type {
  Entity,
  EntityKind,
  Relationship,
  RelationshipTarget,
  RelationshipType,
} from "./shared/GraphTypes.js";
