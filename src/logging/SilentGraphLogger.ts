import type { GraphLogger } from "./GraphLogger.js";

/**
 * Discards everything. For tests that only look at return values.
 */
export const silentLogger: GraphLogger = {
  phase(): void {},
  startProgress(): void {},
  updateProgress(): void {},
  completeProgress(): void {},
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
