export interface FileAnalysisContext {
  /** File path relative to the global root, `/` separators */
  filePath: string;
  /** Absolute global root */
  root: string;
  /** `compilerOptions.paths` of the owning manifest */
  paths?: Readonly<Record<string, readonly string[]>>;
  /** Directory that alias targets are relative to */
  pathsBaseDir: string;
}
