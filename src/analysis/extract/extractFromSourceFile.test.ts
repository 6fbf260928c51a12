import { Project } from "ts-morph";
import { describe, expect, it } from "vitest";
import { extractFromSourceFile } from "./extractFromSourceFile.js";

describe(extractFromSourceFile.name, () => {
  it("returns the file entity first, then declarations", () => {
    const project = new Project({ useInMemoryFileSystem: true });
    const sourceFile = project.createSourceFile(
      "/repo/src/alpha.ts",
      `import { Missing } from "./missing";
export interface Loader { load(): void; }
export class Alpha implements Loader {
  load() {}
}
`,
    );

    const result = extractFromSourceFile(sourceFile, {
      filePath: "src/alpha.ts",
      root: "/repo",
      pathsBaseDir: "/repo",
    });

    expect(result.entities.map((e) => [e.kind, e.id])).toEqual([
      ["File", "src/alpha.ts"],
      ["Class", "src/alpha.ts:Alpha"],
      ["Method", "src/alpha.ts:Alpha.load"],
      ["Interface", "src/alpha.ts:Loader"],
    ]);
    expect(result.entities[0]).toMatchObject({
      name: "alpha.ts",
      properties: { extension: ".ts", startLine: 1 },
      relationships: [],
    });
    expect(result.entities[3]?.relationships).toEqual([
      { type: "DEFINED_IN", target: { status: "resolved", id: "src/alpha.ts" } },
    ]);
    expect(result.warnings).toEqual([
      'Could not resolve import "./missing" in src/alpha.ts. Dropping.',
    ]);
  });
});
