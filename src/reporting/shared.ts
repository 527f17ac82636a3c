/**
 * Traversal order and text helpers shared by the diagram serializers.
 */

import { compareEdges, compareIds } from "../core/builder.js";
import type { GraphEdge, GraphNode, TopologyGraph } from "../types.js";

export type Direction = "TB" | "LR";

/** A node visit during containment traversal. */
export type NodeVisit = {
  node: GraphNode;
  depth: number;
  /** Nodes with containment children are drawn as groups. */
  isGroup: boolean;
};

/**
 * Depth-first containment walk: roots ascending by ID, children ascending by
 * ID. `leave` fires after a group's children have been visited.
 */
export function walkContainment(
  graph: TopologyGraph,
  enter: (visit: NodeVisit) => void,
  leave: (visit: NodeVisit) => void = () => {},
): void {
  const visit = (id: string, depth: number) => {
    const node = graph.nodes.get(id);
    if (!node) return;
    const children = [...node.children].sort(compareIds);
    const entry: NodeVisit = { node, depth, isGroup: children.length > 0 };
    enter(entry);
    for (const child of children) visit(child, depth + 1);
    if (entry.isGroup) leave(entry);
  };

  for (const root of [...graph.roots].sort(compareIds)) visit(root, 0);
}

/** Attachment edges, then peering edges, each ordered by (from, to). */
export function connectingEdges(graph: TopologyGraph): GraphEdge[] {
  const attachment = graph.edges.filter((e) => e.kind === "attachment").sort(compareEdges);
  const peering = graph.edges.filter((e) => e.kind === "peering").sort(compareEdges);
  return [...attachment, ...peering];
}

/** Collapse line breaks and control characters to single spaces. */
export function cleanText(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]+/g, " ").trim();
}

/** Display lines of a node: name, then its salient attribute if any. */
export function labelLines(node: GraphNode): string[] {
  const lines = [cleanText(node.label) || node.id];
  if (node.detail) lines.push(cleanText(node.detail));
  return lines;
}

export function indent(depth: number): string {
  return "  ".repeat(depth + 1);
}
