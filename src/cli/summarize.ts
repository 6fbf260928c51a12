import type { AnalysisResult } from "../analysis/analyzeWorkspace.js";
import type { LoadReport } from "../loading/loadGraph.js";
import type { GraphLogger } from "../logging/GraphLogger.js";

export const logAnalysisSummary = (
  result: AnalysisResult,
  logger: GraphLogger,
): void => {
  const { resolution } = result;
  logger.success(
    `Analyzed ${result.projects.length} projects, ${result.filesScanned} files, ${result.entities.length} entities`,
  );
  logger.info(
    `Resolution: ${resolution.resolved} resolved, ${resolution.unresolved} unresolved, ${resolution.ambiguous} ambiguous, ${resolution.external} external`,
  );
  if (result.errors.length > 0) {
    logger.warn(`${result.errors.length} files or projects failed to analyze`);
  }
};

export const logLoadSummary = (report: LoadReport, logger: GraphLogger): void => {
  logger.success(
    `Loaded ${report.nodesWritten} nodes, ${report.ownershipEdgesWritten} ownership edges, ${report.dependencyEdgesWritten} dependency edges in ${report.durationMs}ms`,
  );
  const skipped = Object.entries(report.skippedByReason)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${count} ${reason}`);
  if (skipped.length > 0) {
    logger.info(`Skipped edges: ${skipped.join(", ")}`);
  }
};
