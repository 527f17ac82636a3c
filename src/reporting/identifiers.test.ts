import { describe, it, expect } from "vitest";
import { buildTopologyGraph } from "../core/builder.js";
import { makeRecord } from "../testing.js";
import { MAX_IDENTIFIER_LENGTH, createIdentifierMap, sanitizeIdentifier } from "./identifiers.js";

describe("sanitizeIdentifier", () => {
  it("replaces runs of illegal characters with one underscore", () => {
    expect(sanitizeIdentifier("vnet-hub")).toBe("vnet_hub");
    expect(sanitizeIdentifier("/subscriptions/abc/vnet")).toBe("subscriptions_abc_vnet");
    expect(sanitizeIdentifier("unassigned::prod")).toBe("unassigned_prod");
  });

  it("never returns an empty identifier", () => {
    expect(sanitizeIdentifier("")).toBe("n");
    expect(sanitizeIdentifier("---")).toBe("n");
  });

  it("prefixes identifiers that start with a digit", () => {
    expect(sanitizeIdentifier("10.0.0.0/16")).toBe("n_10_0_0_0_16");
  });

  it("avoids keywords of both languages", () => {
    expect(sanitizeIdentifier("end")).toBe("end_");
    expect(sanitizeIdentifier("Graph")).toBe("Graph_");
    expect(sanitizeIdentifier("subgraph")).toBe("subgraph_");
  });

  it("keeps the tail of long inputs", () => {
    const id = sanitizeIdentifier(`prefix-${"y".repeat(64)}`);
    expect(id).toBe("y".repeat(64));
    expect(id.length).toBe(MAX_IDENTIFIER_LENGTH);
  });
});

describe("createIdentifierMap", () => {
  it("suffixes collisions in ascending node-ID order", () => {
    const graph = buildTopologyGraph(
      [makeRecord({ id: "a.b", kind: "network" }), makeRecord({ id: "a-b", kind: "network" })],
      "prod",
    );
    const ids = createIdentifierMap(graph);
    expect(ids.get("a-b")).toBe("a_b");
    expect(ids.get("a.b")).toBe("a_b_2");
  });
});
