/**
 * Cloud Topology — Core Types
 *
 * Inventory records as supplied by the discovery collaborator, and the typed
 * graph the builder derives from them. Both diagram serializers consume only
 * the graph shapes defined here.
 */

// =============================================================================
// Inventory Records
// =============================================================================

/** Resource kinds the inventory collaborator normalizes into. */
export type ResourceKind =
  | "network"
  | "subnet"
  | "virtual-machine"
  | "load-balancer"
  | "gateway"
  | "firewall"
  | "peering-link";

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "network",
  "subnet",
  "virtual-machine",
  "load-balancer",
  "gateway",
  "firewall",
  "peering-link",
];

/** Kinds that bind to a subnet rather than being contained by one. */
export const APPLIANCE_KINDS: readonly ResourceKind[] = [
  "virtual-machine",
  "load-balancer",
  "gateway",
  "firewall",
];

/**
 * A single inventory entry.
 *
 * `id` is unique within `scopeId`; the same ID may appear in another scope.
 */
export type ResourceRecord = {
  id: string;
  kind: ResourceKind;
  name: string;
  /** Account / subscription the resource belongs to. */
  scopeId: string;
  /** CIDR prefix (networks and subnets). */
  addressSpace?: string;
  /** Explicit containing node, when the source reports one. */
  parentRef?: string;
  /** Explicit subnet a compute or appliance resource is bound to. */
  attachmentRef?: string;
  /** Free-form attributes; see {@link ATTRIBUTE_KEYS}. */
  attributes: Record<string, unknown>;
};

/** Attribute keys the builder and serializers read. */
export const ATTRIBUTE_KEYS = {
  ipAddress: "ipAddress",
  peeredNetworkIds: "peeredNetworkIds",
  remoteNetworkId: "remoteNetworkId",
  peeringState: "peeringState",
  sku: "sku",
} as const;

/** An inventory boundary (account / subscription). */
export type ScopeInfo = {
  id: string;
  name: string;
};

// =============================================================================
// Categories
// =============================================================================

/** Visual classification bucket, used to choose rendering colors. */
export type NodeCategory =
  | "web"
  | "app"
  | "database"
  | "compute"
  | "load-balancer"
  | "gateway"
  | "firewall"
  | "peering"
  | "generic";

// =============================================================================
// Graph
// =============================================================================

/**
 * Node kinds: every resource kind, plus the synthetic containers the builder
 * (`unassigned`) and the overview (`scope`, `overflow`) introduce.
 */
export type GraphNodeKind = ResourceKind | "unassigned" | "scope" | "overflow";

/** How a node came to sit where it is in the containment forest. */
export type NodePlacement =
  /** No parent by nature (networks, synthetic containers, attached appliances). */
  | "root"
  /** Parent or attachment given by the record itself. */
  | "explicit"
  /** Parent or attachment inferred from address ranges. */
  | "inferred"
  /** Nothing matched; placed under the scope's unassigned container. */
  | "unattached";

export type GraphNode = {
  id: string;
  kind: GraphNodeKind;
  scopeId: string;
  /** Display name. */
  label: string;
  /** Salient attribute shown under the name (address range, IP, SKU). */
  detail: string | null;
  category: NodeCategory;
  placement: NodePlacement;
  /** Containment children, ascending by ID. */
  children: readonly string[];
};

export type GraphEdgeKind = "containment" | "attachment" | "peering";

/**
 * Containment: parent → child. Attachment: subnet → resource.
 * Peering is undirected and always stored with `from < to`.
 */
export type GraphEdge = {
  kind: GraphEdgeKind;
  from: string;
  to: string;
  label?: string;
};

/** A peer reference whose remote network is not part of the graph's scope. */
export type ExternalPeering = {
  networkId: string;
  remoteNetworkId: string;
  state?: string;
};

/**
 * Immutable topology of one scope (or of the cross-scope overview).
 */
export type TopologyGraph = {
  scopeId: string;
  title: string;
  nodes: ReadonlyMap<string, GraphNode>;
  /** Containment, then attachment, then peering; each sorted by (from, to). */
  edges: readonly GraphEdge[];
  /** Nodes without a containment parent, ascending by ID. */
  roots: readonly string[];
  externalPeerings: readonly ExternalPeering[];
};

/** Overview graph: adds peer references no scope could resolve. */
export type OverviewGraph = TopologyGraph & {
  unresolvedPeerings: readonly (ExternalPeering & { scopeId: string })[];
};

/** Node counts by kind, for summaries. */
export type GraphSummary = {
  networks: number;
  subnets: number;
  virtualMachines: number;
  appliances: number;
  peeringLinks: number;
  unattached: number;
  peerings: number;
};
