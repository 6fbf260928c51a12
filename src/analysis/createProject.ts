import { Project } from "ts-morph";

/**
 * Options for creating a ts-morph Project.
 */
export interface CreateProjectOptions {
  tsConfigFilePath: string;
}

/**
 * Create a ts-morph Project holding exactly the files a manifest declares.
 *
 * `files`, `include`, `exclude` and `extends` are expanded by the compiler's
 * own config parser. Imported files are not pulled in: every project only
 * analyzes its own members.
 */
export const createProject = (options: CreateProjectOptions): Project =>
  new Project({
    tsConfigFilePath: options.tsConfigFilePath,
    skipFileDependencyResolution: true,
  });
