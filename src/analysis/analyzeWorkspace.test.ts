import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverProjects } from "../discovery/discoverProjects.js";
import { createRecordingLogger } from "../logging/RecordingGraphLogger.js";
import { silentLogger } from "../logging/SilentGraphLogger.js";
import { resolveRelationships } from "../resolution/resolveRelationships.js";
import {
  createTempWorkspace,
  type TempWorkspace,
  writeSampleWorkspace,
} from "../testing/writeWorkspace.js";
import { analyzeProjects, analyzeWorkspace } from "./analyzeWorkspace.js";

describe(analyzeWorkspace.name, () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createTempWorkspace("structgraph-workspace-test-");
    writeSampleWorkspace(workspace);
  });

  afterEach(() => {
    workspace.remove();
  });

  it("discovers every project with a file list", async () => {
    const logger = createRecordingLogger();

    const result = await analyzeWorkspace(workspace.root, { logger });

    expect(result.projects.map((p) => p.relativeManifestPath)).toEqual([
      "apps/web/tsconfig.app.json",
      "libs/shared/tsconfig.json",
    ]);
    expect(logger.warnings).toContain(
      'tsconfig.json declares neither "files" nor "include". Skipping.',
    );
    expect(result.filesScanned).toBe(5);
    expect(result.errors).toEqual([]);
    expect(logger.phases).toEqual([
      `discover 2 manifests under ${workspace.root}`,
      "resolve 11 entities from 2 manifests",
    ]);
  });

  it("resolves references across projects", async () => {
    const result = await analyzeWorkspace(workspace.root, {
      logger: silentLogger,
    });
    const byId = new Map(result.entities.map((e) => [e.id, e]));

    const beta = byId.get("apps/web/src/beta.component.ts:BetaComponent");
    expect(beta?.kind).toBe("Component");
    expect(beta?.relationships).toContainEqual({
      type: "INJECTS",
      target: {
        status: "resolved",
        id: "libs/shared/src/alpha.service.ts:AlphaService",
      },
      properties: { parameterName: "alpha" },
    });

    expect(
      byId.get("apps/web/src/beta.component.ts")?.relationships,
    ).toContainEqual({
      type: "IMPORTS",
      target: { status: "resolved", id: "libs/shared/src/alpha.service.ts" },
      properties: { from: "@shared/alpha.service", typeOnly: false },
    });

    const appModule = byId.get("apps/web/src/app.module.ts:AppModule");
    expect(appModule?.relationships.map((r) => [r.type, r.target])).toEqual([
      [
        "DEFINED_IN",
        { status: "resolved", id: "apps/web/src/app.module.ts" },
      ],
      [
        "DECLARES",
        {
          status: "resolved",
          id: "apps/web/src/beta.component.ts:BetaComponent",
        },
      ],
      ["PROVIDES", { status: "unresolved", name: "GammaService" }],
      [
        "BOOTSTRAPS",
        {
          status: "resolved",
          id: "apps/web/src/beta.component.ts:BetaComponent",
        },
      ],
    ]);

    expect(result.resolution).toEqual({
      resolved: 7,
      unresolved: 1,
      ambiguous: 0,
      external: 3,
    });
  });

  it("records projects with CONTAINS to their files", async () => {
    const result = await analyzeWorkspace(workspace.root, {
      logger: silentLogger,
    });

    const library = result.entities.find(
      (e) => e.id === "libs/shared/tsconfig.json",
    );
    expect(library).toMatchObject({
      kind: "Project",
      name: "libs/shared",
      properties: { fileCount: 2, include: ["src/**/*.ts"] },
    });
    expect(library?.relationships.map((r) => r.target)).toEqual(
      expect.arrayContaining([
        { status: "resolved", id: "libs/shared/src/alpha.service.ts" },
        { status: "resolved", id: "libs/shared/src/index.ts" },
      ]),
    );
  });

  it("returns entities sorted by id", async () => {
    const result = await analyzeWorkspace(workspace.root, {
      logger: silentLogger,
    });
    const ids = result.entities.map((e) => e.id);

    expect(ids).toEqual([...ids].sort());
  });
});

describe(`${analyzeWorkspace.name} with a shared base config`, () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createTempWorkspace("structgraph-base-config-test-");
    workspace.write(
      "tsconfig.base.json",
      JSON.stringify({
        compilerOptions: { paths: { "@lib/*": ["libs/core/src/*"] } },
      }),
    );
    for (const project of ["libs/core", "apps/web"]) {
      workspace.write(
        `${project}/tsconfig.json`,
        JSON.stringify({
          extends: "../../tsconfig.base.json",
          include: ["src/**/*.ts"],
        }),
      );
    }
    workspace.write("libs/core/src/alpha.ts", "export class Alpha {}\n");
    workspace.write(
      "apps/web/src/main.ts",
      'import { Alpha } from "@lib/alpha";\n\nexport const alpha = new Alpha();\n',
    );
  });

  afterEach(() => {
    workspace.remove();
  });

  it("resolves aliases against the directory of the config declaring paths", async () => {
    const result = await analyzeWorkspace(workspace.root, {
      logger: silentLogger,
    });

    const main = result.entities.find((e) => e.id === "apps/web/src/main.ts");
    expect(main?.relationships).toEqual([
      {
        type: "IMPORTS",
        target: { status: "resolved", id: "libs/core/src/alpha.ts" },
        properties: { from: "@lib/alpha", typeOnly: false },
      },
    ]);
    expect(result.resolution.external).toBe(0);
  });
});

describe(analyzeProjects.name, () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = createTempWorkspace("structgraph-projects-test-");
    writeSampleWorkspace(workspace);
  });

  afterEach(() => {
    workspace.remove();
  });

  it("resolves the same way whatever the scan order", async () => {
    const projects = discoverProjects(workspace.root, { logger: silentLogger });

    const resolveInOrder = async (order: typeof projects) => {
      const { registry } = await analyzeProjects(order, {
        root: workspace.root,
        concurrency: 1,
        logger: silentLogger,
      });
      registry.freeze();
      resolveRelationships(registry, silentLogger);
      return registry
        .entities()
        .sort((a, b) => a.id.localeCompare(b.id));
    };

    const forward = await resolveInOrder(projects);
    const backward = await resolveInOrder([...projects].reverse());

    expect(backward).toEqual(forward);
  });

  it("reports a project that cannot be created and keeps the others", async () => {
    const logger = createRecordingLogger();
    const [first] = discoverProjects(workspace.root, { logger: silentLogger });
    if (!first) {
      throw new Error("sample workspace has no project");
    }

    const { registry, errors } = await analyzeProjects(
      [
        first,
        {
          manifestPath: `${workspace.root}/gone/tsconfig.json`,
          relativeManifestPath: "gone/tsconfig.json",
          include: ["src/**/*.ts"],
        },
      ],
      { root: workspace.root, logger },
    );

    expect(errors).toHaveLength(1);
    expect(errors[0]?.file).toBe("gone/tsconfig.json");
    expect(errors[0]?.message).toMatch(
      /^Failed to analyze project gone\/tsconfig\.json: /,
    );
    expect(logger.errors).toHaveLength(1);
    expect(registry.has(first.relativeManifestPath)).toBe(true);
  });
});
