/**
 * Cloud Topology — Cross-Scope Overview
 *
 * Merges the top-level networks of every scope graph into a single graph.
 * Each scope becomes a container, each network an opaque node (its subnets
 * collapse into a count), and only peering edges survive, including the
 * ones that cross scope boundaries.
 */

import type { ExternalPeering, GraphEdge, GraphNode, OverviewGraph, TopologyGraph } from "../types.js";
import { PeeringSet, assembleGraph, compareIds } from "./builder.js";

// =============================================================================
// Types
// =============================================================================

export type OverviewOptions = {
  /** Networks shown per scope before the rest fold into one node (0 = no limit). */
  maxNetworksPerScope?: number;
  title?: string;
};

export const OVERVIEW_SCOPE_ID = "overview";

const DEFAULT_MAX_NETWORKS = 5;

// =============================================================================
// Helpers
// =============================================================================

// Overview IDs are tagged by kind, and their parts are percent-encoded so
// no scope or node ID can spell out another one's separator.

export function qualifiedNodeId(scopeId: string, nodeId: string): string {
  return `net:${encodeURIComponent(scopeId)}/${encodeURIComponent(nodeId)}`;
}

export function scopeNodeId(scopeId: string): string {
  return `scope:${encodeURIComponent(scopeId)}`;
}

export function overflowNodeId(scopeId: string): string {
  return `overflow:${encodeURIComponent(scopeId)}`;
}

/** Top-level ancestor of a node, following containment edges upward. */
function rootOf(nodeId: string, parents: ReadonlyMap<string, string>): string {
  let current = nodeId;
  for (let parent = parents.get(current); parent !== undefined; parent = parents.get(current)) {
    current = parent;
  }
  return current;
}

function parentMap(graph: TopologyGraph): Map<string, string> {
  const parents = new Map<string, string>();
  for (const edge of graph.edges) {
    if (edge.kind === "containment") parents.set(edge.to, edge.from);
  }
  return parents;
}

function networkDetail(graph: TopologyGraph, node: GraphNode): string {
  const subnetCount = node.children.filter((id) => graph.nodes.get(id)?.kind === "subnet").length;
  const count = `${subnetCount} ${subnetCount === 1 ? "subnet" : "subnets"}`;
  return node.detail ? `${node.detail} · ${count}` : count;
}

// =============================================================================
// Overview Builder
// =============================================================================

/**
 * Build the overview graph from already-built scope graphs.
 *
 * @throws GraphValidationError when qualified IDs collide.
 */
export function buildOverviewGraph(
  graphs: readonly TopologyGraph[],
  options: OverviewOptions = {},
): OverviewGraph {
  const limit = options.maxNetworksPerScope ?? DEFAULT_MAX_NETWORKS;
  const ordered = [...graphs].sort((a, b) => compareIds(a.scopeId, b.scopeId));

  const nodes: Array<Omit<GraphNode, "children">> = [];
  const parents = new Map<string, string>();
  /** Qualified network ID → overview node standing in for that network. */
  const endpoints = new Map<string, string>();

  for (const graph of ordered) {
    const scopeId = graph.scopeId;
    const container = scopeNodeId(scopeId);
    nodes.push({
      id: container,
      kind: "scope",
      scopeId,
      label: graph.title,
      detail: graph.title === scopeId ? null : scopeId,
      category: "generic",
      placement: "root",
    });

    const networks = graph.roots
      .map((id) => graph.nodes.get(id))
      .filter((n): n is GraphNode => n !== undefined && n.kind === "network");
    const shown = limit > 0 ? networks.slice(0, limit) : networks;
    const hidden = networks.slice(shown.length);

    for (const network of shown) {
      const id = qualifiedNodeId(scopeId, network.id);
      nodes.push({
        id,
        kind: "network",
        scopeId,
        label: network.label,
        detail: networkDetail(graph, network),
        category: network.category,
        placement: "explicit",
      });
      parents.set(id, container);
      endpoints.set(qualifiedNodeId(scopeId, network.id), id);
    }

    if (hidden.length > 0) {
      const id = overflowNodeId(scopeId);
      nodes.push({
        id,
        kind: "overflow",
        scopeId,
        label: `…and ${hidden.length} more ${hidden.length === 1 ? "network" : "networks"}`,
        detail: null,
        category: "generic",
        placement: "explicit",
      });
      parents.set(id, container);
      for (const network of hidden) endpoints.set(qualifiedNodeId(scopeId, network.id), id);
    }
  }

  // -- Peerings ----------------------------------------------------------------
  const peerings = new PeeringSet();
  const unresolved: Array<ExternalPeering & { scopeId: string }> = [];

  const endpointFor = (graph: TopologyGraph, nodeId: string, parents: ReadonlyMap<string, string>) =>
    endpoints.get(qualifiedNodeId(graph.scopeId, rootOf(nodeId, parents)));

  for (const graph of ordered) {
    const graphParents = parentMap(graph);

    for (const edge of graph.edges) {
      if (edge.kind !== "peering") continue;
      const from = endpointFor(graph, edge.from, graphParents);
      const to = endpointFor(graph, edge.to, graphParents);
      if (from !== undefined && to !== undefined) peerings.add(from, to, edge.label);
    }

    for (const peering of graph.externalPeerings) {
      const remote = ordered.find((g) => g.scopeId !== graph.scopeId && g.nodes.has(peering.remoteNetworkId));
      const from = endpointFor(graph, peering.networkId, graphParents);
      const to = remote ? endpointFor(remote, peering.remoteNetworkId, parentMap(remote)) : undefined;

      if (from !== undefined && to !== undefined) {
        peerings.add(from, to, peering.state);
      } else {
        unresolved.push({ ...peering, scopeId: graph.scopeId });
      }
    }
  }

  const edges: GraphEdge[] = peerings.edges();
  const overview = assembleGraph({
    scopeId: OVERVIEW_SCOPE_ID,
    title: options.title ?? "Network Overview",
    nodes,
    parents,
    edges,
  });

  return Object.freeze({ ...overview, unresolvedPeerings: Object.freeze(unresolved) });
}
