/**
 * Inventory factories shared by the test suites.
 */

import type { ResourceRecord } from "./types.js";

export function makeRecord(overrides: Partial<ResourceRecord> & Pick<ResourceRecord, "id" | "kind">): ResourceRecord {
  return {
    name: overrides.id,
    scopeId: "prod",
    attributes: {},
    ...overrides,
  };
}

/**
 * Hub-and-spoke scope with one inferred and one explicit subnet, attached
 * compute, two orphans and a peering reported from both ends.
 */
export function sampleRecords(scopeId = "prod"): ResourceRecord[] {
  return [
    makeRecord({
      id: "vnet-hub",
      kind: "network",
      name: "hub-vnet",
      scopeId,
      addressSpace: "10.0.0.0/16",
      attributes: { peeredNetworkIds: ["vnet-spoke"] },
    }),
    makeRecord({
      id: "vnet-spoke",
      kind: "network",
      name: "spoke-vnet",
      scopeId,
      addressSpace: "10.1.0.0/16",
      attributes: { peeredNetworkIds: [{ id: "vnet-hub", state: "Connected" }, "vnet-remote"] },
    }),
    makeRecord({ id: "snet-web", kind: "subnet", name: "web-subnet", scopeId, addressSpace: "10.0.1.0/24" }),
    makeRecord({
      id: "snet-db",
      kind: "subnet",
      name: "db-subnet",
      scopeId,
      addressSpace: "10.1.2.0/24",
      parentRef: "vnet-spoke",
    }),
    makeRecord({
      id: "vm-web-1",
      kind: "virtual-machine",
      name: "web-vm-01",
      scopeId,
      attributes: { ipAddress: "10.0.1.4" },
    }),
    makeRecord({
      id: "lb-web",
      kind: "load-balancer",
      name: "web-lb",
      scopeId,
      attachmentRef: "snet-web",
      attributes: { sku: "Standard" },
    }),
    makeRecord({ id: "vm-orphan", kind: "virtual-machine", name: "legacy-vm", scopeId }),
    makeRecord({ id: "fw-edge", kind: "firewall", name: "edge-fw", scopeId, attributes: { ipAddress: "172.16.0.4" } }),
  ];
}

/** Deterministic reorderings of a list: reversed and every rotation. */
export function permutations<T>(items: readonly T[]): T[][] {
  const result: T[][] = [[...items].reverse()];
  for (let i = 1; i < items.length; i++) {
    result.push([...items.slice(i), ...items.slice(0, i)]);
  }
  return result;
}
