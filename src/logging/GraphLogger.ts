/** Pipeline stages, in run order. */
export type GraphPhase = "discover" | "scan" | "resolve" | "load";

/**
 * Logging interface every pipeline stage receives.
 *
 * Output goes to stderr, so `analyze` can print its document on stdout.
 *
 * @example
 * ```typescript
 * logger.phase("discover", "2 manifests under /work/repo");
 * logger.startProgress(12, "apps/web/tsconfig.app.json");
 * logger.updateProgress(5);
 * logger.completeProgress(12, 48);
 * logger.phase("resolve", "60 entities from 2 manifests");
 * logger.warn("Skipped edge src/app.module.ts:AppModule -PROVIDES-> Unresolved:Gamma (unresolved)");
 * ```
 */
export interface GraphLogger {
  /** Announce a pipeline stage. */
  phase(phase: GraphPhase, message: string): void;

  /** Begin scanning one manifest of `total` files. */
  startProgress(total: number, label: string): void;

  /** Files handled so far in the current manifest. */
  updateProgress(current: number): void;

  /** Close the current manifest's scan. */
  completeProgress(filesCount: number, entitiesCount: number): void;

  success(message: string): void;

  info(message: string): void;

  warn(message: string): void;

  error(message: string): void;
}
