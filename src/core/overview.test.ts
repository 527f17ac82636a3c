import { describe, it, expect } from "vitest";
import { makeRecord, sampleRecords } from "../testing.js";
import { buildTopologyGraph } from "./builder.js";
import { OVERVIEW_SCOPE_ID, buildOverviewGraph } from "./overview.js";

function prodGraph() {
  return buildTopologyGraph(sampleRecords(), { id: "prod", name: "Production" });
}

function devGraph() {
  return buildTopologyGraph(
    [makeRecord({ id: "vnet-remote", kind: "network", name: "remote-vnet", scopeId: "dev", addressSpace: "10.2.0.0/16" })],
    "dev",
  );
}

describe("buildOverviewGraph", () => {
  it("collapses each scope to its networks and keeps only peerings", () => {
    const overview = buildOverviewGraph([prodGraph(), devGraph()]);

    expect(overview.scopeId).toBe(OVERVIEW_SCOPE_ID);
    expect(overview.title).toBe("Network Overview");
    expect(overview.roots).toEqual(["scope:dev", "scope:prod"]);
    expect(overview.nodes.get("scope:prod")).toMatchObject({ kind: "scope", label: "Production", detail: "prod" });
    expect(overview.nodes.get("scope:dev")).toMatchObject({ label: "dev", detail: null });
    expect(overview.nodes.get("net:prod/vnet-hub")).toMatchObject({
      kind: "network",
      label: "hub-vnet",
      detail: "10.0.0.0/16 · 1 subnet",
    });
    expect(overview.nodes.get("net:dev/vnet-remote")?.detail).toBe("10.2.0.0/16 · 0 subnets");
    expect(overview.edges).toEqual([
      { kind: "containment", from: "scope:dev", to: "net:dev/vnet-remote" },
      { kind: "containment", from: "scope:prod", to: "net:prod/vnet-hub" },
      { kind: "containment", from: "scope:prod", to: "net:prod/vnet-spoke" },
      { kind: "peering", from: "net:dev/vnet-remote", to: "net:prod/vnet-spoke" },
      { kind: "peering", from: "net:prod/vnet-hub", to: "net:prod/vnet-spoke", label: "Connected" },
    ]);
    expect(overview.unresolvedPeerings).toEqual([]);
  });

  it("lists peerings no scope can resolve", () => {
    const overview = buildOverviewGraph([prodGraph()]);
    expect(overview.unresolvedPeerings).toEqual([
      { networkId: "vnet-spoke", remoteNetworkId: "vnet-remote", scopeId: "prod" },
    ]);
    expect(overview.edges.filter((e) => e.kind === "peering")).toHaveLength(1);
  });

  it("folds networks beyond the cap into one node", () => {
    const graph = buildTopologyGraph(
      [
        makeRecord({ id: "n1", kind: "network", scopeId: "s", attributes: { peeredNetworkIds: ["n3"] } }),
        makeRecord({ id: "n2", kind: "network", scopeId: "s" }),
        makeRecord({ id: "n3", kind: "network", scopeId: "s" }),
      ],
      "s",
    );
    const overview = buildOverviewGraph([graph], { maxNetworksPerScope: 2 });

    expect(overview.nodes.get("scope:s")?.children).toEqual(["net:s/n1", "net:s/n2", "overflow:s"]);
    expect(overview.nodes.get("overflow:s")).toMatchObject({ kind: "overflow", label: "…and 1 more network" });
    expect(overview.edges.filter((e) => e.kind === "peering")).toEqual([
      { kind: "peering", from: "net:s/n1", to: "overflow:s" },
    ]);

    const unlimited = buildOverviewGraph([graph], { maxNetworksPerScope: 0 });
    expect(unlimited.nodes.has("net:s/n3")).toBe(true);
    expect(unlimited.nodes.has("overflow:s")).toBe(false);
  });

  it("keeps IDs apart when a scope ID looks like a node ID", () => {
    const graphs = [
      buildTopologyGraph([makeRecord({ id: "a", kind: "network", scopeId: "scope" })], "scope"),
      buildTopologyGraph([makeRecord({ id: "n", kind: "network", scopeId: "a" })], "a"),
      buildTopologyGraph([makeRecord({ id: "b::c", kind: "network", scopeId: "x" })], "x"),
      buildTopologyGraph([makeRecord({ id: "c", kind: "network", scopeId: "x::b" })], "x::b"),
    ];
    const overview = buildOverviewGraph(graphs);

    expect(overview.nodes.size).toBe(8);
    expect(overview.nodes.get("net:scope/a")?.scopeId).toBe("scope");
    expect(overview.nodes.get("scope:a")?.children).toEqual(["net:a/n"]);
    expect(overview.nodes.get("net:x/b%3A%3Ac")?.scopeId).toBe("x");
    expect(overview.nodes.get("net:x%3A%3Ab/c")?.scopeId).toBe("x::b");
  });

  it("reports a peering whose remote has no overview node", () => {
    const prod = buildTopologyGraph(
      [makeRecord({ id: "vnet-1", kind: "network", attributes: { peeredNetworkIds: ["snet-loose"] } })],
      "prod",
    );
    const dev = buildTopologyGraph(
      [makeRecord({ id: "snet-loose", kind: "subnet", scopeId: "dev", addressSpace: "10.9.0.0/24" })],
      "dev",
    );
    const overview = buildOverviewGraph([prod, dev]);

    expect(overview.edges.filter((e) => e.kind === "peering")).toEqual([]);
    expect(overview.unresolvedPeerings).toEqual([
      { networkId: "vnet-1", remoteNetworkId: "snet-loose", scopeId: "prod" },
    ]);
  });

  it("does not depend on the order of the scope graphs", () => {
    const a = buildOverviewGraph([prodGraph(), devGraph()]);
    const b = buildOverviewGraph([devGraph(), prodGraph()]);
    expect([...b.nodes.entries()]).toEqual([...a.nodes.entries()]);
    expect(b.edges).toEqual(a.edges);
  });
});
