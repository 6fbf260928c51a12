import type { GraphLogger, GraphPhase } from "./GraphLogger.js";

/**
 * Logger that keeps phases, warnings and errors in memory.
 */
export interface RecordingGraphLogger extends GraphLogger {
  /** `{phase} {message}` in call order */
  readonly phases: string[];
  readonly warnings: string[];
  readonly errors: string[];
}

export const createRecordingLogger = (): RecordingGraphLogger => {
  const phases: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];

  return {
    phases,
    warnings,
    errors,
    phase(phase: GraphPhase, message: string): void {
      phases.push(`${phase} ${message}`);
    },
    startProgress(): void {},
    updateProgress(): void {},
    completeProgress(): void {},
    success(): void {},
    info(): void {},
    warn(message: string): void {
      warnings.push(message);
    },
    error(message: string): void {
      errors.push(message);
    },
  };
};
