/**
 * Diagram identifier sanitization.
 *
 * Both serializers take node identifiers from the same map, so a node is
 * called the same thing in the Mermaid and the DOT output. Identifiers match
 * `[A-Za-z_][A-Za-z0-9_]*`, avoid the keywords of either language and are at
 * most {@link MAX_IDENTIFIER_LENGTH} characters long.
 */

import { compareIds } from "../core/builder.js";
import type { TopologyGraph } from "../types.js";

export const MAX_IDENTIFIER_LENGTH = 64;

/** DOT keywords and Mermaid flowchart keywords, lowercased. */
const RESERVED = new Set([
  "node",
  "edge",
  "graph",
  "digraph",
  "subgraph",
  "strict",
  "end",
  "flowchart",
  "style",
  "classdef",
  "class",
  "click",
  "linkstyle",
  "direction",
  "default",
  "call",
  "href",
]);

/**
 * Map any string to a legal identifier. Long inputs keep their tail, which
 * for provider resource paths carries the resource name.
 */
export function sanitizeIdentifier(raw: string): string {
  let id = raw.replace(/[^A-Za-z0-9_]+/g, "_").replace(/^_+|_+$/g, "");

  if (id.length > MAX_IDENTIFIER_LENGTH) {
    id = id.slice(id.length - MAX_IDENTIFIER_LENGTH).replace(/^_+/, "");
  }
  if (id === "") id = "n";
  if (/^[0-9]/.test(id)) {
    id = `n_${id.slice(Math.max(0, id.length - (MAX_IDENTIFIER_LENGTH - 2)))}`;
  }
  if (RESERVED.has(id.toLowerCase())) id = `${id}_`;

  return id;
}

/**
 * Assign every node of the graph a unique identifier. Collisions are
 * suffixed `_2`, `_3`, … in ascending node-ID order.
 */
export function createIdentifierMap(graph: TopologyGraph): ReadonlyMap<string, string> {
  const ids = [...graph.nodes.keys()].sort(compareIds);
  const taken = new Set<string>();
  const result = new Map<string, string>();

  for (const id of ids) {
    const base = sanitizeIdentifier(id);
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) {
      const suffix = `_${n}`;
      candidate = base.slice(0, MAX_IDENTIFIER_LENGTH - suffix.length) + suffix;
    }
    taken.add(candidate);
    result.set(id, candidate);
  }

  return result;
}
