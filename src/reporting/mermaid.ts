/**
 * Cloud Topology — Mermaid Serializer
 *
 * Emits a Mermaid flowchart for embedding in markdown viewers that render
 * Mermaid natively. Containers become `subgraph … end` blocks; attachments
 * are solid arrows and peerings undirected dotted links.
 */

import { summarizeGraph } from "../core/builder.js";
import type { GraphEdge, GraphNode, GraphNodeKind, GraphSummary, NodeCategory, TopologyGraph } from "../types.js";
import { createIdentifierMap } from "./identifiers.js";
import { CATEGORY_LEGEND, DEFAULT_PALETTE, styleFor, type CategoryPalette } from "./palette.js";
import { cleanText, connectingEdges, indent, labelLines, walkContainment, type Direction } from "./shared.js";

// =============================================================================
// Types
// =============================================================================

export type MermaidOptions = {
  direction?: Direction;
  palette?: CategoryPalette;
};

export type MermaidMarkdownOptions = MermaidOptions & {
  /** Page heading; defaults to `Network Topology: <title>`. */
  heading?: string;
  /** Totals listed under a `Summary` section. */
  summary?: GraphSummary;
};

// =============================================================================
// Helpers
// =============================================================================

/** Escape text for a quoted Mermaid label using entity codes. */
export function escapeMermaid(text: string): string {
  return cleanText(text)
    .replace(/#/g, "#35;")
    .replace(/"/g, "#quot;")
    .replace(/</g, "#lt;")
    .replace(/>/g, "#gt;")
    .replace(/\|/g, "#124;");
}

/** Shape delimiters by node kind. */
function shapeFor(kind: GraphNodeKind): [string, string] {
  switch (kind) {
    case "network":
    case "subnet":
      return ["([", "])"]; // stadium
    case "load-balancer":
    case "gateway":
      return ["{{", "}}"]; // hexagon
    case "firewall":
      return ["[[", "]]"]; // subroutine
    case "peering-link":
      return [">", "]"]; // asymmetric
    case "overflow":
      return ["(", ")"]; // rounded
    default:
      return ["[", "]"];
  }
}

function nodeLabel(node: GraphNode): string {
  return labelLines(node).map(escapeMermaid).join("<br/>");
}

function styleLine(id: string, category: NodeCategory, palette: CategoryPalette): string {
  const style = styleFor(category, palette);
  return `style ${id} fill:${style.fill},stroke:${style.stroke},color:${style.fontColor}`;
}

function edgeLine(edge: GraphEdge, from: string, to: string): string {
  if (edge.kind === "peering") {
    return edge.label ? `${from} -.-|"${escapeMermaid(edge.label)}"| ${to}` : `${from} -.- ${to}`;
  }
  return edge.label ? `${from} -->|"${escapeMermaid(edge.label)}"| ${to}` : `${from} --> ${to}`;
}

// =============================================================================
// Serializer
// =============================================================================

/**
 * Serialize a topology graph as a Mermaid flowchart. Deterministic: equal
 * graphs produce identical text.
 */
export function toMermaid(graph: TopologyGraph, options: MermaidOptions = {}): string {
  const palette = options.palette ?? DEFAULT_PALETTE;
  const ids = createIdentifierMap(graph);
  const idOf = (nodeId: string) => ids.get(nodeId) ?? nodeId;

  const lines: string[] = [];
  lines.push(`flowchart ${options.direction ?? "TB"}`);
  lines.push(`%% ${cleanText(graph.title)}`);

  walkContainment(
    graph,
    ({ node, depth, isGroup }) => {
      const pad = indent(depth);
      if (isGroup) {
        lines.push(`${pad}subgraph ${idOf(node.id)}["${nodeLabel(node)}"]`);
      } else {
        const [open, close] = shapeFor(node.kind);
        lines.push(`${pad}${idOf(node.id)}${open}"${nodeLabel(node)}"${close}`);
        lines.push(`${pad}${styleLine(idOf(node.id), node.category, palette)}`);
      }
    },
    ({ node, depth }) => {
      const pad = indent(depth);
      lines.push(`${pad}end`);
      lines.push(`${pad}${styleLine(idOf(node.id), node.category, palette)}`);
    },
  );

  const edges = connectingEdges(graph);
  if (edges.length > 0) {
    lines.push("");
    for (const edge of edges) {
      lines.push(`${indent(0)}${edgeLine(edge, idOf(edge.from), idOf(edge.to))}`);
    }
  }

  return lines.join("\n") + "\n";
}

/**
 * Wrap the Mermaid document in a markdown page with a legend.
 */
export function toMermaidMarkdown(graph: TopologyGraph, options: MermaidMarkdownOptions = {}): string {
  const palette = options.palette ?? DEFAULT_PALETTE;
  const heading = options.heading ?? `Network Topology: ${cleanText(graph.title)}`;

  const present = new Set<NodeCategory>();
  for (const node of graph.nodes.values()) present.add(node.category);
  const hasAttachments = graph.edges.some((e) => e.kind === "attachment");
  const hasPeerings = graph.edges.some((e) => e.kind === "peering");

  const lines: string[] = [];
  lines.push(`# ${heading}`);
  lines.push("");
  lines.push("```mermaid");
  lines.push(toMermaid(graph, options).trimEnd());
  lines.push("```");
  lines.push("");
  lines.push("## Legend");
  lines.push("");
  for (const [category, description] of CATEGORY_LEGEND) {
    if (!present.has(category)) continue;
    lines.push(`- **${description}**: \`${styleFor(category, palette).fill}\``);
  }
  if (hasAttachments) lines.push("- **Solid arrows**: subnet attachments");
  if (hasPeerings) lines.push("- **Dotted lines**: network peering");

  if (options.summary) {
    const s = options.summary;
    lines.push("");
    lines.push("## Summary");
    lines.push("");
    lines.push(`- **Networks**: ${s.networks}`);
    lines.push(`- **Subnets**: ${s.subnets}`);
    lines.push(`- **Virtual machines**: ${s.virtualMachines}`);
    lines.push(`- **Appliances**: ${s.appliances}`);
    lines.push(`- **Unattached resources**: ${s.unattached}`);
    lines.push(`- **Peerings**: ${s.peerings}`);
  }

  return lines.join("\n") + "\n";
}

/** Markdown page for one scope graph, with its own totals. */
export function scopeMarkdown(graph: TopologyGraph, options: MermaidOptions = {}): string {
  return toMermaidMarkdown(graph, { ...options, summary: summarizeGraph(graph) });
}
