#!/usr/bin/env node

// Early error handlers to catch module loading failures
process.on("uncaughtException", (error) => {
  console.error("[structgraph] Uncaught exception:", error.message);
  if (error.stack) console.error(error.stack);
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  console.error("[structgraph] Unhandled rejection:", reason);
  process.exit(1);
});

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { consoleLogger } from "../logging/ConsoleGraphLogger.js";
import type { GraphLogger } from "../logging/GraphLogger.js";
import { errorMessage } from "../shared/errors.js";
import { runAnalyze, runBuild, runLoad } from "./commands.js";
import { parseArgs, USAGE, UsageError } from "./parseArgs.js";

/**
 * Run one command line.
 *
 * @returns Process exit code: 0 on success (skipped edges and manifests
 * included), 1 on fatal errors
 */
export const main = async (
  args: readonly string[],
  logger: GraphLogger = consoleLogger,
): Promise<number> => {
  try {
    const parsed = parseArgs(args);

    switch (parsed.command) {
      case "help":
        console.error(USAGE);
        break;
      case "analyze":
        await runAnalyze(parsed, logger);
        break;
      case "load":
        await runLoad(parsed, logger);
        break;
      case "build":
        await runBuild(parsed, logger);
        break;
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      console.error(USAGE);
      return 1;
    }
    logger.error(`Fatal error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
};

// Run main if executed directly
// Use realpathSync to handle npm bin symlinks (process.argv[1] may be a symlink)
const resolvedScript = process.argv[1] ? realpathSync(process.argv[1]) : "";
if (resolvedScript && import.meta.url === pathToFileURL(resolvedScript).href) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      console.error("[structgraph] Unhandled error:", error);
      process.exit(1);
    });
}
