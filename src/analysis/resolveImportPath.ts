import { dirname, resolve } from "node:path";

/**
 * Inputs needed to resolve one import specifier.
 */
export interface ImportResolutionContext {
  /** Absolute path of the importing file */
  importingFilePath: string;
  /** Absolute global root, used for the root-relative fallback */
  root: string;
  /** `compilerOptions.paths` of the owning manifest */
  paths?: Readonly<Record<string, readonly string[]>>;
  /** Directory that alias targets are relative to (`baseUrl`, else the manifest directory) */
  pathsBaseDir: string;
  /** Existence check on the project's file system */
  fileExists: (absolutePath: string) => boolean;
}

const CANDIDATE_SUFFIXES = [
  ".ts",
  ".tsx",
  ".d.ts",
  "/index.ts",
  "/index.tsx",
  "",
] as const;

const JS_TO_TS_EXTENSIONS: ReadonlyArray<readonly [string, readonly string[]]> =
  [
    [".js", [".ts", ".tsx"]],
    [".jsx", [".tsx"]],
    [".mjs", [".mts"]],
    [".cjs", [".cts"]],
  ];

export const isRelativeSpecifier = (specifier: string): boolean =>
  specifier === "." ||
  specifier === ".." ||
  specifier.startsWith("./") ||
  specifier.startsWith("../");

/**
 * Probe a base path with the TypeScript suffixes, in order.
 * A `.js`-style ending is first swapped for its TypeScript counterpart.
 *
 * @returns The first existing candidate, or undefined
 */
export const probeCandidates = (
  basePath: string,
  fileExists: (absolutePath: string) => boolean,
): string | undefined => {
  for (const [jsExtension, tsExtensions] of JS_TO_TS_EXTENSIONS) {
    if (basePath.endsWith(jsExtension)) {
      const stem = basePath.slice(0, -jsExtension.length);
      for (const tsExtension of tsExtensions) {
        if (fileExists(stem + tsExtension)) {
          return stem + tsExtension;
        }
      }
    }
  }

  for (const suffix of CANDIDATE_SUFFIXES) {
    const candidate = basePath + suffix;
    if (fileExists(candidate)) {
      return candidate;
    }
  }

  return undefined;
};

/**
 * Expand a specifier through the alias table.
 * Wildcard keys are tried longest prefix first, the way the compiler does.
 *
 * @example
 * expandAliases("@app/core/logger", { "@app/*": ["src/app/*", "libs/*"] })
 * // => ["src/app/core/logger", "libs/core/logger"]
 */
export const expandAliases = (
  specifier: string,
  paths: Readonly<Record<string, readonly string[]>>,
): string[] => {
  const exact = paths[specifier];
  if (exact && !specifier.includes("*")) {
    return [...exact];
  }

  const wildcardKeys = Object.keys(paths)
    .filter((key) => key.endsWith("*"))
    .sort((a, b) => b.length - a.length);

  for (const key of wildcardKeys) {
    const prefix = key.slice(0, -1);
    if (!specifier.startsWith(prefix)) {
      continue;
    }
    const rest = specifier.slice(prefix.length);
    return (paths[key] ?? []).map((target) => target.replace("*", rest));
  }

  return [];
};

/**
 * Resolve an import specifier to an absolute file path.
 *
 * Order:
 * 1. relative specifiers against the importing file (and nothing else);
 * 2. alias substitution from the manifest's `paths` table;
 * 3. root-relative fallback.
 *
 * @returns The absolute path of an existing file, or undefined
 */
export const resolveImportPath = (
  specifier: string,
  context: ImportResolutionContext,
): string | undefined => {
  const { fileExists } = context;

  if (isRelativeSpecifier(specifier)) {
    return probeCandidates(
      resolve(dirname(context.importingFilePath), specifier),
      fileExists,
    );
  }

  if (context.paths) {
    for (const target of expandAliases(specifier, context.paths)) {
      const resolved = probeCandidates(
        resolve(context.pathsBaseDir, target),
        fileExists,
      );
      if (resolved) {
        return resolved;
      }
    }
  }

  return probeCandidates(resolve(context.root, specifier), fileExists);
};
