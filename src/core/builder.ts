/**
 * Cloud Topology — Graph Builder
 *
 * Turns the flat, unordered inventory of one scope into an immutable
 * topology graph:
 *
 * - explicit `parentRef` / `attachmentRef` references are taken as given
 * - otherwise subnets are placed in the narrowest network whose address
 *   space strictly contains theirs, and appliances are attached to the
 *   narrowest subnet containing their IP
 * - anything left over goes under a synthetic "Unassigned" container
 * - peerings are collected from both ends and deduplicated by sorted pair
 *
 * Records are sorted by ID before any decision is made, so the resulting
 * graph does not depend on input order.
 */

import { GraphValidationError } from "../errors.js";
import {
  APPLIANCE_KINDS,
  ATTRIBUTE_KEYS,
  type ExternalPeering,
  type GraphEdge,
  type GraphNode,
  type GraphSummary,
  type NodePlacement,
  type ResourceRecord,
  type ScopeInfo,
  type TopologyGraph,
} from "../types.js";
import { createClassifier, type Classifier } from "./classifier.js";
import { containsAddress, isStrictSuperset, parseAddressSpace, parseIpAddress, type CidrPrefix } from "./cidr.js";

// =============================================================================
// Types
// =============================================================================

export type BuildOptions = {
  classifier?: Classifier;
  /** Diagram title; defaults to the scope name. */
  title?: string;
};

type Placement = {
  parent: string | null;
  placement: NodePlacement;
};

type Candidate = {
  id: string;
  prefixes: CidrPrefix[];
};

// =============================================================================
// Helpers
// =============================================================================

/** Ordinal string comparison; never locale-dependent. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return compareIds(a.from, b.from) || compareIds(a.to, b.to);
}

/**
 * ID of the synthetic container holding unattached resources of a scope.
 * Suffixed with `#2`, `#3`, … while the base ID is taken by a record.
 */
export function unassignedNodeId(scopeId: string, taken: ReadonlySet<string> = new Set()): string {
  const base = `unassigned::${scopeId}`;
  let candidate = base;
  for (let n = 2; taken.has(candidate); n++) candidate = `${base}#${n}`;
  return candidate;
}

function stringAttribute(record: ResourceRecord, key: string): string | undefined {
  const value = record.attributes[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/** Peer references: plain IDs, or `{ id, state }` objects. */
function peerReferences(record: ResourceRecord): Array<{ id: string; state?: string }> {
  const raw = record.attributes[ATTRIBUTE_KEYS.peeredNetworkIds];
  const entries: unknown[] = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];
  const refs: Array<{ id: string; state?: string }> = [];

  for (const entry of entries) {
    if (typeof entry === "string" && entry !== "") {
      refs.push({ id: entry });
    } else if (typeof entry === "object" && entry !== null && "id" in entry && typeof entry.id === "string") {
      const state = "state" in entry && typeof entry.state === "string" ? entry.state : undefined;
      refs.push(state ? { id: entry.id, state } : { id: entry.id });
    }
  }
  return refs;
}

/**
 * Pick the candidate with the longest prefix accepted by `matches`.
 * Candidates arrive in ascending ID order, so only a strictly narrower
 * match replaces the current best and exact ties keep the lowest ID.
 */
function narrowest(candidates: readonly Candidate[], matches: (prefix: CidrPrefix) => boolean): string | null {
  let best: { id: string; length: number } | null = null;
  for (const candidate of candidates) {
    for (const prefix of candidate.prefixes) {
      if (!matches(prefix)) continue;
      if (!best || prefix.prefixLength > best.length) {
        best = { id: candidate.id, length: prefix.prefixLength };
      }
    }
  }
  return best?.id ?? null;
}

function nodeDetail(record: ResourceRecord): string | null {
  switch (record.kind) {
    case "network":
    case "subnet":
      return record.addressSpace?.trim() || null;
    case "peering-link":
      return stringAttribute(record, ATTRIBUTE_KEYS.peeringState) ?? null;
    default:
      return (
        stringAttribute(record, ATTRIBUTE_KEYS.ipAddress) ??
        stringAttribute(record, ATTRIBUTE_KEYS.sku) ??
        null
      );
  }
}

// =============================================================================
// Validation
// =============================================================================

function assertUniqueIds(scopeId: string, sorted: readonly ResourceRecord[]): void {
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const curr = sorted[i];
    if (prev && curr && prev.id === curr.id) {
      throw new GraphValidationError(
        "duplicate-node",
        scopeId,
        [curr.id],
        `Duplicate resource ID "${curr.id}" (${prev.kind} "${prev.name}" and ${curr.kind} "${curr.name}")`,
      );
    }
  }
}

function assertReference(scopeId: string, known: ReadonlySet<string>, from: string, to: string, field: string): void {
  if (!known.has(to)) {
    throw new GraphValidationError(
      "dangling-edge",
      scopeId,
      [from, to],
      `Resource "${from}" references unknown ${field} "${to}"`,
    );
  }
}

/** Walk every parent chain; a chain revisiting one of its own nodes is a cycle. */
function assertForest(scopeId: string, parents: ReadonlyMap<string, string>, ids: readonly string[]): void {
  const settled = new Set<string>();

  for (const start of ids) {
    const chain: string[] = [];
    const onChain = new Set<string>();
    let current: string | undefined = start;

    while (current !== undefined && !settled.has(current)) {
      if (onChain.has(current)) {
        const loop = chain.slice(chain.indexOf(current));
        throw new GraphValidationError(
          "containment-cycle",
          scopeId,
          loop,
          `Containment cycle: ${[...loop, current].join(" → ")}`,
        );
      }
      chain.push(current);
      onChain.add(current);
      current = parents.get(current);
    }

    for (const id of chain) settled.add(id);
  }
}

function assertEndpoints(scopeId: string, nodes: ReadonlyMap<string, GraphNode>, edges: readonly GraphEdge[]): void {
  for (const edge of edges) {
    if (!nodes.has(edge.from) || !nodes.has(edge.to)) {
      throw new GraphValidationError(
        "dangling-edge",
        scopeId,
        [edge.from, edge.to],
        `${edge.kind} edge ${edge.from} → ${edge.to} references a missing node`,
      );
    }
  }
}

// =============================================================================
// Graph Assembly
// =============================================================================

/**
 * Assemble and validate a graph from prepared nodes, parent links and
 * non-containment edges. Shared by the scope builder and the overview.
 */
export function assembleGraph(input: {
  scopeId: string;
  title: string;
  nodes: ReadonlyArray<Omit<GraphNode, "children">>;
  parents: ReadonlyMap<string, string>;
  edges: readonly GraphEdge[];
  externalPeerings?: readonly ExternalPeering[];
}): TopologyGraph {
  const { scopeId } = input;
  const ids = input.nodes.map((n) => n.id).sort(compareIds);

  for (let i = 1; i < ids.length; i++) {
    if (ids[i] === ids[i - 1]) {
      const id = ids[i] ?? "";
      throw new GraphValidationError("duplicate-node", scopeId, [id], `Duplicate node ID "${id}"`);
    }
  }

  const known = new Set(ids);
  for (const [child, parent] of input.parents) {
    assertReference(scopeId, known, child, parent, "parent");
    assertReference(scopeId, known, parent, child, "child");
  }
  assertForest(scopeId, input.parents, ids);

  const children = new Map<string, string[]>();
  for (const [child, parent] of input.parents) {
    const list = children.get(parent) ?? [];
    list.push(child);
    children.set(parent, list);
  }

  const nodes = new Map<string, GraphNode>();
  for (const node of [...input.nodes].sort((a, b) => compareIds(a.id, b.id))) {
    const kids = (children.get(node.id) ?? []).sort(compareIds);
    nodes.set(node.id, Object.freeze({ ...node, children: Object.freeze(kids) }));
  }

  const containment: GraphEdge[] = [...input.parents]
    .map(([child, parent]): GraphEdge => ({ kind: "containment", from: parent, to: child }))
    .sort(compareEdges);
  const attachment = input.edges.filter((e) => e.kind === "attachment").sort(compareEdges);
  const peering = input.edges.filter((e) => e.kind === "peering").sort(compareEdges);
  const edges = [...containment, ...attachment, ...peering].map((e) => Object.freeze(e));
  assertEndpoints(scopeId, nodes, edges);

  const roots = ids.filter((id) => !input.parents.has(id));

  return Object.freeze({
    scopeId,
    title: input.title,
    nodes,
    edges: Object.freeze(edges),
    roots: Object.freeze(roots),
    externalPeerings: Object.freeze([...(input.externalPeerings ?? [])]),
  });
}

/**
 * Collects peering edges, rejecting a second insertion of the same
 * (sorted) endpoint pair. A later insertion only fills in a missing label.
 */
export class PeeringSet {
  private readonly seen = new Map<string, number>();
  private readonly collected: GraphEdge[] = [];

  add(a: string, b: string, state?: string): boolean {
    if (a === b) return false;
    const [from, to] = compareIds(a, b) <= 0 ? [a, b] : [b, a];
    const key = `${from}\u0000${to}`;
    const index = this.seen.get(key);
    if (index !== undefined) {
      const stored = this.collected[index];
      if (state && stored && stored.label === undefined) this.collected[index] = { ...stored, label: state };
      return false;
    }
    this.seen.set(key, this.collected.length);
    this.collected.push(state ? { kind: "peering", from, to, label: state } : { kind: "peering", from, to });
    return true;
  }

  edges(): GraphEdge[] {
    return [...this.collected];
  }
}

// =============================================================================
// Scope Builder
// =============================================================================

/**
 * Build the topology graph of a single scope.
 *
 * @throws GraphValidationError on duplicate IDs, references to unknown
 *   nodes, or containment cycles.
 */
export function buildTopologyGraph(
  records: readonly ResourceRecord[],
  scope: ScopeInfo | string,
  options: BuildOptions = {},
): TopologyGraph {
  const scopeInfo = typeof scope === "string" ? { id: scope, name: scope } : scope;
  const scopeId = scopeInfo.id;
  const classify = options.classifier ?? createClassifier();

  for (const record of records) {
    if (record.scopeId !== scopeId) {
      throw new Error(`Resource "${record.id}" belongs to scope "${record.scopeId}", not "${scopeId}"`);
    }
  }

  const sorted = [...records].sort((a, b) => compareIds(a.id, b.id));
  assertUniqueIds(scopeId, sorted);

  const known = new Set(sorted.map((r) => r.id));
  const networks: Candidate[] = sorted
    .filter((r) => r.kind === "network")
    .map((r) => ({ id: r.id, prefixes: parseAddressSpace(r.addressSpace) }));
  const subnets: Candidate[] = sorted
    .filter((r) => r.kind === "subnet")
    .map((r) => ({ id: r.id, prefixes: parseAddressSpace(r.addressSpace) }));

  const placements = new Map<string, Placement>();
  const edges: GraphEdge[] = [];

  for (const record of sorted) {
    const parentRef = record.parentRef || undefined;
    const attachmentRef = record.attachmentRef || undefined;

    if (parentRef !== undefined || attachmentRef !== undefined) {
      if (parentRef !== undefined) {
        if (parentRef === record.id) {
          throw new GraphValidationError(
            "containment-cycle",
            scopeId,
            [record.id],
            `Resource "${record.id}" lists itself as its parent`,
          );
        }
        assertReference(scopeId, known, record.id, parentRef, "parent");
      }
      if (attachmentRef !== undefined) {
        assertReference(scopeId, known, record.id, attachmentRef, "attachment");
        edges.push({ kind: "attachment", from: attachmentRef, to: record.id });
      }
      placements.set(record.id, { parent: parentRef ?? null, placement: "explicit" });
      continue;
    }

    if (record.kind === "network") {
      placements.set(record.id, { parent: null, placement: "root" });
      continue;
    }

    if (record.kind === "subnet") {
      const own = parseAddressSpace(record.addressSpace);
      const network = narrowest(networks, (prefix) => own.some((p) => isStrictSuperset(prefix, p)));
      placements.set(
        record.id,
        network ? { parent: network, placement: "inferred" } : { parent: null, placement: "unattached" },
      );
      continue;
    }

    if (APPLIANCE_KINDS.includes(record.kind)) {
      const ipText = stringAttribute(record, ATTRIBUTE_KEYS.ipAddress);
      const ip = ipText ? parseIpAddress(ipText) : null;
      const subnet = ip ? narrowest(subnets, (prefix) => containsAddress(prefix, ip)) : null;
      if (subnet) {
        edges.push({ kind: "attachment", from: subnet, to: record.id });
        placements.set(record.id, { parent: null, placement: "inferred" });
      } else {
        placements.set(record.id, { parent: null, placement: "unattached" });
      }
      continue;
    }

    placements.set(record.id, { parent: null, placement: "unattached" });
  }

  // -- Peerings --------------------------------------------------------------
  const peerings = new PeeringSet();
  const external: ExternalPeering[] = [];

  const addPeering = (networkId: string, remoteId: string, state?: string) => {
    if (known.has(remoteId)) {
      peerings.add(networkId, remoteId, state);
    } else {
      external.push(state ? { networkId, remoteNetworkId: remoteId, state } : { networkId, remoteNetworkId: remoteId });
    }
  };

  for (const record of sorted) {
    if (record.kind === "network") {
      for (const peer of peerReferences(record)) addPeering(record.id, peer.id, peer.state);
    } else if (record.kind === "peering-link") {
      const local = record.parentRef || undefined;
      const remote = stringAttribute(record, ATTRIBUTE_KEYS.remoteNetworkId);
      if (local !== undefined && remote !== undefined) {
        addPeering(local, remote, stringAttribute(record, ATTRIBUTE_KEYS.peeringState));
      }
    }
  }

  // -- Nodes -----------------------------------------------------------------
  const nodes: Array<Omit<GraphNode, "children">> = sorted.map((record) => ({
    id: record.id,
    kind: record.kind,
    scopeId,
    label: record.name || record.id,
    detail: nodeDetail(record),
    category: classify(record),
    placement: placements.get(record.id)?.placement ?? "root",
  }));

  const parents = new Map<string, string>();
  const unattached = nodes.filter((n) => n.placement === "unattached");
  const containerId = unassignedNodeId(scopeId, known);

  if (unattached.length > 0) {
    nodes.push({
      id: containerId,
      kind: "unassigned",
      scopeId,
      label: "Unassigned",
      detail: `${unattached.length} ${unattached.length === 1 ? "resource" : "resources"}`,
      category: "generic",
      placement: "root",
    });
  }

  for (const [id, placement] of placements) {
    if (placement.parent !== null) parents.set(id, placement.parent);
    else if (placement.placement === "unattached") parents.set(id, containerId);
  }

  return assembleGraph({
    scopeId,
    title: options.title ?? scopeInfo.name,
    nodes,
    parents,
    edges: [...edges, ...peerings.edges()],
    externalPeerings: external,
  });
}

/**
 * Group records by scope and build one graph per scope, ascending by scope
 * ID. Scopes listed in `scopes` but without records yield empty graphs.
 */
export function buildScopeGraphs(
  records: readonly ResourceRecord[],
  scopes: readonly ScopeInfo[] = [],
  options: Omit<BuildOptions, "title"> = {},
): TopologyGraph[] {
  const byScope = new Map<string, ResourceRecord[]>();
  for (const scope of scopes) byScope.set(scope.id, []);
  for (const record of records) {
    const list = byScope.get(record.scopeId) ?? [];
    list.push(record);
    byScope.set(record.scopeId, list);
  }

  const names = new Map(scopes.map((s) => [s.id, s.name]));
  return [...byScope.keys()]
    .sort(compareIds)
    .map((scopeId) =>
      buildTopologyGraph(byScope.get(scopeId) ?? [], { id: scopeId, name: names.get(scopeId) ?? scopeId }, options),
    );
}

/** Count nodes by kind. */
export function summarizeGraph(graph: TopologyGraph): GraphSummary {
  const summary: GraphSummary = {
    networks: 0,
    subnets: 0,
    virtualMachines: 0,
    appliances: 0,
    peeringLinks: 0,
    unattached: 0,
    peerings: 0,
  };

  for (const node of graph.nodes.values()) {
    switch (node.kind) {
      case "network":
        summary.networks++;
        break;
      case "subnet":
        summary.subnets++;
        break;
      case "virtual-machine":
        summary.virtualMachines++;
        break;
      case "load-balancer":
      case "gateway":
      case "firewall":
        summary.appliances++;
        break;
      case "peering-link":
        summary.peeringLinks++;
        break;
    }
    if (node.placement === "unattached") summary.unattached++;
  }

  summary.peerings = graph.edges.filter((e) => e.kind === "peering").length;
  return summary;
}
