/**
 * Cloud Topology — Graphviz DOT Serializer
 *
 * Emits a `digraph` for offline rendering with Graphviz. Containers become
 * `cluster_` subgraphs holding a point-shaped anchor node under the
 * container's own identifier, so edges can attach to a container and be
 * clipped at its border (`compound=true` with `lhead` / `ltail`).
 */

import type { GraphEdge, GraphNode, GraphNodeKind, TopologyGraph } from "../types.js";
import { createIdentifierMap } from "./identifiers.js";
import { DEFAULT_PALETTE, styleFor, type CategoryPalette } from "./palette.js";
import { cleanText, connectingEdges, indent, labelLines, walkContainment, type Direction } from "./shared.js";

export type DotOptions = {
  direction?: Direction;
  palette?: CategoryPalette;
  fontName?: string;
};

/** Escape text for a double-quoted DOT string. */
export function escapeDot(text: string): string {
  return cleanText(text).replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function quote(text: string): string {
  return `"${escapeDot(text)}"`;
}

function nodeLabel(node: GraphNode): string {
  return `"${labelLines(node).map(escapeDot).join("\\n")}"`;
}

function shapeFor(kind: GraphNodeKind): string {
  switch (kind) {
    case "virtual-machine":
      return "box3d";
    case "load-balancer":
    case "gateway":
      return "hexagon";
    case "firewall":
      return "octagon";
    case "peering-link":
      return "cds";
    case "network":
      return "tab";
    case "overflow":
      return "note";
    default:
      return "box";
  }
}

function attributes(attrs: Array<[string, string]>): string {
  return attrs.map(([k, v]) => `${k}=${v}`).join(", ");
}

/**
 * Serialize a topology graph as Graphviz DOT. Deterministic: equal graphs
 * produce identical text.
 */
export function toDot(graph: TopologyGraph, options: DotOptions = {}): string {
  const palette = options.palette ?? DEFAULT_PALETTE;
  const font = quote(options.fontName ?? "Helvetica");
  const ids = createIdentifierMap(graph);
  const idOf = (nodeId: string) => ids.get(nodeId) ?? nodeId;
  const isGroup = (nodeId: string) => (graph.nodes.get(nodeId)?.children.length ?? 0) > 0;

  const lines: string[] = [];
  lines.push(`// Network topology: ${cleanText(graph.title)}`);
  lines.push("digraph topology {");
  lines.push(
    `${indent(0)}graph [${attributes([
      ["rankdir", options.direction ?? "TB"],
      ["compound", "true"],
      ["fontname", font],
      ["label", quote(graph.title)],
      ["labelloc", "t"],
    ])}];`,
  );
  lines.push(`${indent(0)}node [shape=box, style="filled,rounded", fontname=${font}, fontsize=10];`);
  lines.push(`${indent(0)}edge [fontname=${font}, fontsize=9];`);
  lines.push("");

  walkContainment(
    graph,
    ({ node, depth, isGroup: group }) => {
      const pad = indent(depth);
      const style = styleFor(node.category, palette);
      const colors: Array<[string, string]> = [
        ["fillcolor", quote(style.fill)],
        ["color", quote(style.stroke)],
        ["fontcolor", quote(style.fontColor)],
      ];

      if (group) {
        const inner = indent(depth + 1);
        lines.push(`${pad}subgraph cluster_${idOf(node.id)} {`);
        lines.push(`${inner}label=${nodeLabel(node)};`);
        lines.push(`${inner}style="filled,rounded";`);
        for (const [key, value] of colors) lines.push(`${inner}${key}=${value};`);
        lines.push(
          `${inner}${idOf(node.id)} [${attributes([
            ["label", nodeLabel(node)],
            ["shape", "point"],
            ["width", "0.08"],
            ...colors,
          ])}];`,
        );
      } else {
        lines.push(
          `${pad}${idOf(node.id)} [${attributes([
            ["label", nodeLabel(node)],
            ["shape", shapeFor(node.kind)],
            ...colors,
          ])}];`,
        );
      }
    },
    ({ depth }) => {
      lines.push(`${indent(depth)}}`);
    },
  );

  const edges = connectingEdges(graph);
  if (edges.length > 0) lines.push("");
  for (const edge of edges) {
    lines.push(`${indent(0)}${edgeStatement(edge, idOf, isGroup, palette)}`);
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}

function edgeStatement(
  edge: GraphEdge,
  idOf: (nodeId: string) => string,
  isGroup: (nodeId: string) => boolean,
  palette: CategoryPalette,
): string {
  const attrs: Array<[string, string]> = [];

  if (edge.kind === "peering") {
    attrs.push(["dir", "none"], ["style", "dashed"], ["color", quote(styleFor("peering", palette).stroke)]);
  } else {
    attrs.push(["style", "solid"]);
  }
  if (edge.label) attrs.push(["label", quote(edge.label)]);
  if (isGroup(edge.from)) attrs.push(["ltail", `cluster_${idOf(edge.from)}`]);
  if (isGroup(edge.to)) attrs.push(["lhead", `cluster_${idOf(edge.to)}`]);

  return `${idOf(edge.from)} -> ${idOf(edge.to)} [${attributes(attrs)}];`;
}
