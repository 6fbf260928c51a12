import { describe, expect, it } from "vitest";
import { StoreConnectionError } from "../../shared/errors.js";
import type { GraphNode } from "../Types.js";
import type { CypherRunner } from "./CypherRunner.js";
import { BOLT_BATCH_SIZE, createBoltWriter } from "./createBoltWriter.js";

interface RecordedQuery {
  query: string;
  params: Record<string, unknown>;
}

/**
 * In-process stand-in for a Bolt session: records queries and answers
 * id lookups from a fixed set.
 */
const createFakeRunner = (
  storedIds: readonly string[] = [],
  reachable = true,
): CypherRunner & { queries: RecordedQuery[]; closed: boolean } => {
  const queries: RecordedQuery[] = [];
  const state = { closed: false };

  return {
    queries,
    get closed() {
      return state.closed;
    },
    async run(query, params = {}) {
      queries.push({ query, params });
      const ids = params.ids;
      if (Array.isArray(ids)) {
        return storedIds
          .filter((id) => ids.includes(id))
          .map((id) => ({ id }));
      }
      return [];
    },
    async verifyConnectivity() {
      if (!reachable) {
        throw new Error("connection refused");
      }
    },
    async close() {
      state.closed = true;
    },
  };
};

const node = (id: string, kind: GraphNode["kind"] = "Service"): GraphNode => ({
  id,
  kind,
  name: id,
  filePath: "src/a.ts",
  properties: { exported: true },
});

describe(createBoltWriter.name, () => {
  it("wraps connection failures in StoreConnectionError", async () => {
    const writer = createBoltWriter(createFakeRunner([], false));

    await expect(writer.verifyConnectivity()).rejects.toThrow(
      StoreConnectionError,
    );
    await expect(writer.verifyConnectivity()).rejects.toThrow(
      "Cannot reach graph database: connection refused",
    );
  });

  it("ensures the id constraint once, then merges nodes per kind", async () => {
    const runner = createFakeRunner();
    const writer = createBoltWriter(runner);

    await writer.upsertNodes([node("a"), node("b", "Module"), node("c")]);
    await writer.upsertNodes([node("d")]);

    const constraintQueries = runner.queries.filter((q) =>
      q.query.startsWith("CREATE CONSTRAINT"),
    );
    expect(constraintQueries).toHaveLength(1);

    const [serviceQuery, moduleQuery] = runner.queries.slice(1, 3);
    expect(serviceQuery?.query).toContain("SET n:Service");
    expect(serviceQuery?.params.batch).toEqual([
      {
        id: "a",
        properties: {
          exported: true,
          kind: "Service",
          name: "a",
          filePath: "src/a.ts",
        },
      },
      {
        id: "c",
        properties: {
          exported: true,
          kind: "Service",
          name: "c",
          filePath: "src/a.ts",
        },
      },
    ]);
    expect(moduleQuery?.query).toContain("SET n:Module");
  });

  it("merges edges with the relationship type inlined", async () => {
    const runner = createFakeRunner();
    const writer = createBoltWriter(runner);

    await writer.upsertEdges([
      { source: "b", target: "a", type: "INJECTS", properties: {} },
    ]);

    expect(runner.queries).toHaveLength(1);
    expect(runner.queries[0]?.query).toContain("MERGE (a)-[r:INJECTS]->(b)");
    expect(runner.queries[0]?.params).toEqual({
      batch: [{ source: "b", target: "a", properties: {} }],
    });
  });

  it("looks ids up in batches", async () => {
    const runner = createFakeRunner(["id-0", `id-${BOLT_BATCH_SIZE}`]);
    const writer = createBoltWriter(runner);
    const ids = Array.from(
      { length: BOLT_BATCH_SIZE + 1 },
      (_, i) => `id-${i}`,
    );

    const existing = await writer.findExistingNodeIds(ids);

    expect(runner.queries).toHaveLength(2);
    expect(existing).toEqual(new Set(["id-0", `id-${BOLT_BATCH_SIZE}`]));
  });

  it("clears and closes through the runner", async () => {
    const runner = createFakeRunner();
    const writer = createBoltWriter(runner);

    await writer.clearAll();
    await writer.close();

    expect(runner.queries[0]?.query).toBe("MATCH (n:Entity) DETACH DELETE n");
    expect(runner.closed).toBe(true);
  });
});
