import { describe, expect, it } from "vitest";
import { InvalidDocumentError } from "../shared/errors.js";
import type { Entity } from "../shared/GraphTypes.js";
import {
  createAnalysisDocument,
  parseAnalysisDocument,
  serializeAnalysisDocument,
} from "./AnalysisDocument.js";

const module: Entity = {
  id: "src/app.module.ts:AppModule",
  kind: "Module",
  name: "AppModule",
  filePath: "src/app.module.ts",
  properties: { exported: true, providers: ["Gamma"] },
  relationships: [
    { type: "PROVIDES", target: { status: "unresolved", name: "Gamma" } },
  ],
};

describe(createAnalysisDocument.name, () => {
  it("stamps version and generation time", () => {
    expect(
      createAnalysisDocument("/repo", [module], new Date("2024-05-01T10:00:00Z")),
    ).toEqual({
      version: 1,
      root: "/repo",
      generatedAt: "2024-05-01T10:00:00.000Z",
      entities: [module],
    });
  });
});

describe(parseAnalysisDocument.name, () => {
  it("accepts a serialized document", () => {
    const document = createAnalysisDocument("/repo", [module]);

    expect(
      parseAnalysisDocument(serializeAnalysisDocument(document), "graph.json"),
    ).toEqual(document);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseAnalysisDocument("{", "graph.json")).toThrow(
      new InvalidDocumentError("Invalid JSON in analysis document graph.json"),
    );
  });

  it("names the first invalid field", () => {
    const content = JSON.stringify({
      version: 1,
      root: "/repo",
      generatedAt: "2024-05-01T10:00:00.000Z",
      entities: [{ ...module, kind: "Widget" }],
    });

    expect(() => parseAnalysisDocument(content, "graph.json")).toThrow(
      InvalidDocumentError,
    );
    expect(() => parseAnalysisDocument(content, "graph.json")).toThrow(
      /^Invalid analysis document graph\.json \(entities\.0\.kind: /,
    );
  });

  it("rejects other versions", () => {
    const content = JSON.stringify({
      version: 2,
      root: "/repo",
      generatedAt: "2024-05-01T10:00:00.000Z",
      entities: [],
    });

    expect(() => parseAnalysisDocument(content, "graph.json")).toThrow(
      /\(version: /,
    );
  });
});
