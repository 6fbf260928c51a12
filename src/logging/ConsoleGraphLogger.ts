import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { GraphLogger, GraphPhase } from "./GraphLogger.js";

/** Where console output goes; `process.stderr` unless a test swaps it. */
export interface LogStream {
  write(text: string): unknown;
  isTTY?: boolean;
}

export interface ConsoleGraphLoggerOptions {
  stream?: LogStream;
  /** `false` forces plain text */
  color?: boolean;
}

const RETURN_AND_CLEAR = "\r\x1b[2K";
const PHASE_COLUMN = 9;

/**
 * Stage-tagged stderr logger.
 *
 * Every line reads `[structgraph] {stage} {message}`. On a terminal the
 * per-file scan counter is redrawn in place; elsewhere only the closing
 * line of each manifest is printed.
 */
export const createConsoleGraphLogger = (
  options: ConsoleGraphLoggerOptions = {},
): GraphLogger => {
  const stream = options.stream ?? process.stderr;
  const paint: ChalkInstance =
    options.color === false ? new Chalk({ level: 0 }) : chalk;
  const redraw = stream.isTTY === true;
  const prefix = paint.dim("[structgraph]");

  let manifest: { label: string; total: number } | undefined;
  let counterShown = false;

  const tag = (stage: string, color: ChalkInstance): string =>
    color(stage.padEnd(PHASE_COLUMN));

  const print = (text: string): void => {
    stream.write(`${counterShown ? RETURN_AND_CLEAR : ""}${prefix} ${text}\n`);
    counterShown = false;
  };

  const drawCounter = (current: number): void => {
    if (!redraw || !manifest) {
      return;
    }
    stream.write(
      `${RETURN_AND_CLEAR}${prefix} ${tag("scan", paint.cyan)}${manifest.label} ${current}/${manifest.total}`,
    );
    counterShown = true;
  };

  return {
    phase(phase: GraphPhase, message: string): void {
      print(`${tag(phase, paint.cyan)}${message}`);
    },

    startProgress(total: number, label: string): void {
      manifest = { label, total };
      drawCounter(0);
    },

    updateProgress(current: number): void {
      drawCounter(current);
    },

    completeProgress(filesCount: number, entitiesCount: number): void {
      const label = manifest?.label ?? "";
      manifest = undefined;
      print(
        `${tag("scan", paint.cyan)}${label}: ${filesCount} files, ${entitiesCount} entities`,
      );
    },

    success(message: string): void {
      print(`${tag("done", paint.green)}${message}`);
    },

    info(message: string): void {
      print(`${" ".repeat(PHASE_COLUMN)}${message}`);
    },

    warn(message: string): void {
      print(`${tag("warning", paint.yellow)}${message}`);
    },

    error(message: string): void {
      print(`${tag("error", paint.red)}${message}`);
    },
  };
};

export const consoleLogger = createConsoleGraphLogger();
