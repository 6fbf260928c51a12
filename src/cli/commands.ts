import { existsSync } from "node:fs";
import {
  createAnalysisDocument,
  readAnalysisDocument,
  serializeAnalysisDocument,
  writeAnalysisDocument,
} from "../analysis/AnalysisDocument.js";
import {
  type AnalysisResult,
  analyzeWorkspace,
} from "../analysis/analyzeWorkspace.js";
import {
  type ConfigResult,
  loadConfigOrDefault,
  resolveConfig,
} from "../config/configLoader.utils.js";
import { createGraphWriter } from "../db/createGraphWriter.js";
import { type LoadReport, loadGraph } from "../loading/loadGraph.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import type { Entity } from "../shared/GraphTypes.js";
import { logAnalysisSummary, logLoadSummary } from "./summarize.js";

const loadRunConfig = (root: string, logger: GraphLogger): ConfigResult => {
  // A document may come from another machine: a missing root just means defaults
  if (!existsSync(root)) {
    return { config: resolveConfig({}), source: "default" };
  }
  const result = loadConfigOrDefault(root);
  if (result.source === "explicit") {
    logger.info(`Using config ${result.configPath}`);
  }
  return result;
};

const analyze = async (
  root: string,
  logger: GraphLogger,
): Promise<AnalysisResult> => {
  const { config } = loadRunConfig(root, logger);
  const result = await analyzeWorkspace(root, {
    manifestFileNames: config.manifestFileNames,
    ignoreDirectories: config.ignoreDirectories,
    concurrency: config.concurrency,
    logger,
  });
  logAnalysisSummary(result, logger);
  return result;
};

const load = async (
  root: string,
  entities: readonly Entity[],
  options: { dbPath?: string; clear: boolean },
  logger: GraphLogger,
): Promise<LoadReport> => {
  const { config } = loadRunConfig(root, logger);
  const writer = createGraphWriter({
    root,
    storage: config.storage,
    dbPath: options.dbPath,
  });

  try {
    const report = await loadGraph(entities, writer, {
      logger,
      clearFirst: options.clear,
    });
    logLoadSummary(report, logger);
    return report;
  } finally {
    await writer.close();
  }
};

/**
 * `structgraph analyze <root> [--out file]`
 *
 * @param write - Sink for the document when no output file is given
 */
export const runAnalyze = async (
  options: { root: string; out?: string },
  logger: GraphLogger,
  write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<AnalysisResult> => {
  const result = await analyze(options.root, logger);
  const document = createAnalysisDocument(result.root, result.entities);

  if (options.out) {
    writeAnalysisDocument(options.out, document);
    logger.success(`Wrote analysis document to ${options.out}`);
  } else {
    write(serializeAnalysisDocument(document));
  }

  return result;
};

/**
 * `structgraph load <document> [--db path] [--clear]`
 *
 * @throws InvalidDocumentError if the document cannot be read or validated
 */
export const runLoad = async (
  options: { document: string; dbPath?: string; clear: boolean },
  logger: GraphLogger,
): Promise<LoadReport> => {
  const document = readAnalysisDocument(options.document);
  logger.info(
    `Loading ${document.entities.length} entities from ${options.document}`,
  );
  return load(document.root, document.entities, options, logger);
};

/**
 * `structgraph build <root> [--db path] [--clear]`
 */
export const runBuild = async (
  options: { root: string; dbPath?: string; clear: boolean },
  logger: GraphLogger,
): Promise<LoadReport> => {
  const result = await analyze(options.root, logger);
  return load(result.root, result.entities, options, logger);
};
