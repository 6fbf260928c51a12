import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { GraphReader } from "../GraphReader.js";
import type { GraphWriter } from "../GraphWriter.js";
import type { GraphEdge, GraphNode } from "../Types.js";
import { createSqliteReader } from "./createSqliteReader.js";
import { createSqliteWriter } from "./createSqliteWriter.js";
import { closeDatabase, openDatabase } from "./sqliteConnection.utils.js";

const service = (name: string, file = "src/test.ts"): GraphNode => ({
  id: `${file}:${name}`,
  kind: "Service",
  name,
  filePath: file,
  properties: { exported: true },
});

const injects = (source: string, target: string): GraphEdge => ({
  source,
  target,
  type: "INJECTS",
  properties: {},
});

describe(createSqliteWriter.name, () => {
  let db: Database.Database;
  let writer: GraphWriter;
  let reader: GraphReader;

  beforeEach(() => {
    db = openDatabase({ path: ":memory:" });
    writer = createSqliteWriter(db);
    reader = createSqliteReader(db);
  });

  afterEach(() => {
    if (db.open) {
      closeDatabase(db);
    }
  });

  it("verifies connectivity on an open database", async () => {
    await expect(writer.verifyConnectivity()).resolves.toBeUndefined();
  });

  it("upserts nodes by id", async () => {
    await writer.upsertNodes([service("Alpha")]);
    await writer.upsertNodes([service("Alpha")]);

    expect(await reader.countNodes()).toBe(1);
    expect(await reader.getNode("src/test.ts:Alpha")).toEqual(service("Alpha"));
  });

  it("merges properties of an existing node", async () => {
    await writer.upsertNodes([
      { ...service("Alpha"), properties: { exported: true, startLine: 3 } },
    ]);
    await writer.upsertNodes([
      { ...service("Alpha"), properties: { providedIn: "root", startLine: 4 } },
    ]);

    expect((await reader.getNode("src/test.ts:Alpha"))?.properties).toEqual({
      exported: true,
      startLine: 4,
      providedIn: "root",
    });
  });

  it("overwrites the kind of an existing node", async () => {
    await writer.upsertNodes([{ ...service("Alpha"), kind: "Class" }]);
    await writer.upsertNodes([service("Alpha")]);

    expect((await reader.getNode("src/test.ts:Alpha"))?.kind).toBe("Service");
  });

  it("keeps one edge per source, target and type", async () => {
    await writer.upsertNodes([service("Alpha"), service("Beta")]);
    const edge = injects("src/test.ts:Beta", "src/test.ts:Alpha");

    await writer.upsertEdges([edge]);
    await writer.upsertEdges([
      { ...edge, properties: { parameterName: "alpha" } },
    ]);

    expect(await reader.getEdges()).toEqual([
      { ...edge, properties: { parameterName: "alpha" } },
    ]);
  });

  it("finds which ids are stored", async () => {
    await writer.upsertNodes([service("Alpha")]);

    const existing = await writer.findExistingNodeIds([
      "src/test.ts:Alpha",
      "src/test.ts:Missing",
    ]);

    expect([...existing]).toEqual(["src/test.ts:Alpha"]);
    expect(await writer.findExistingNodeIds([])).toEqual(new Set());
  });

  it("clears everything", async () => {
    await writer.upsertNodes([service("Alpha"), service("Beta")]);
    await writer.upsertEdges([
      injects("src/test.ts:Beta", "src/test.ts:Alpha"),
    ]);

    await writer.clearAll();

    expect(await reader.countNodes()).toBe(0);
    expect(await reader.countEdges()).toBe(0);
  });

  it("closes the connection", async () => {
    await writer.close();

    expect(db.open).toBe(false);
  });
});

describe(createSqliteReader.name, () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase({ path: ":memory:" });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it("filters edges by any combination of fields", async () => {
    const writer = createSqliteWriter(db);
    const reader = createSqliteReader(db);
    await writer.upsertNodes([service("A"), service("B"), service("C")]);
    await writer.upsertEdges([
      injects("src/test.ts:A", "src/test.ts:B"),
      injects("src/test.ts:A", "src/test.ts:C"),
      { ...injects("src/test.ts:B", "src/test.ts:C"), type: "IMPLEMENTS" },
    ]);

    expect(
      (await reader.getEdges({ source: "src/test.ts:A" })).map((e) => e.target),
    ).toEqual(["src/test.ts:B", "src/test.ts:C"]);
    expect(
      (await reader.getEdges({ target: "src/test.ts:C", type: "INJECTS" })).map(
        (e) => e.source,
      ),
    ).toEqual(["src/test.ts:A"]);
  });

  it("returns undefined for unknown nodes", async () => {
    expect(await createSqliteReader(db).getNode("nope")).toBeUndefined();
  });
});
