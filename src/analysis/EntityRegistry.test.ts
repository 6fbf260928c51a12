import { describe, expect, it } from "vitest";
import { RegistryFrozenError } from "../shared/errors.js";
import type { Entity } from "../shared/GraphTypes.js";
import { createEntityRegistry } from "./EntityRegistry.js";

const service = (name: string, filePath = "src/a.ts"): Entity => ({
  id: `${filePath}:${name}`,
  kind: "Service",
  name,
  filePath,
  properties: {},
  relationships: [],
});

describe(createEntityRegistry.name, () => {
  it("registers each identity once", () => {
    const registry = createEntityRegistry();

    registry.register(service("Alpha"));
    registry.register(service("Alpha"));
    registry.register(service("Alpha", "src/b.ts"));

    expect(registry.size).toBe(2);
    expect(registry.entities().map((e) => e.id)).toEqual([
      "src/a.ts:Alpha",
      "src/b.ts:Alpha",
    ]);
  });

  it("keeps a class that merges with a same-named interface", () => {
    const registry = createEntityRegistry();
    registry.register({ ...service("Alpha"), kind: "Class" });

    registry.register({ ...service("Alpha"), kind: "Interface" });

    expect(registry.get("src/a.ts:Alpha")?.kind).toBe("Class");
  });

  it("merges a re-registered identity instead of duplicating it", () => {
    const registry = createEntityRegistry();
    registry.register({ ...service("Alpha"), kind: "Class" });

    registry.register({
      ...service("Alpha"),
      properties: { providedIn: "root" },
    });

    expect(registry.get("src/a.ts:Alpha")).toEqual({
      ...service("Alpha"),
      properties: { providedIn: "root" },
    });
  });

  it("keeps its own copy of registered entities", () => {
    const registry = createEntityRegistry();
    const input = service("Alpha");

    registry.register(input);
    input.properties.providedIn = "root";

    expect(registry.get("src/a.ts:Alpha")?.properties).toEqual({});
  });

  it("merges whole scans", () => {
    const registry = createEntityRegistry();

    registry.mergeScan([service("Alpha"), service("Beta")]);
    registry.mergeScan([service("Beta")]);

    expect(registry.size).toBe(2);
    expect(registry.has("src/a.ts:Beta")).toBe(true);
  });

  it("rejects writes once frozen", () => {
    const registry = createEntityRegistry();
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(service("Alpha"))).toThrow(
      RegistryFrozenError,
    );
  });
});
