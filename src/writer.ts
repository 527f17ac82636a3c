/**
 * Cloud Topology — Diagram Files
 *
 * Builds every scope graph and the cross-scope overview from an inventory,
 * then writes one Mermaid markdown page and one DOT file for each.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { buildScopeGraphs, compareIds, summarizeGraph } from "./core/builder.js";
import { createClassifier } from "./core/classifier.js";
import { buildOverviewGraph } from "./core/overview.js";
import { resolveConfig, type ResolvedConfig } from "./config.js";
import type { Inventory } from "./inventory.js";
import { silentLogger, type Logger } from "./logging.js";
import { toDot } from "./reporting/dot.js";
import { toMermaidMarkdown } from "./reporting/mermaid.js";
import type { GraphSummary, OverviewGraph, TopologyGraph } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type DiagramArtifact = {
  /** Scope ID, or `overview` for the cross-scope page. */
  scopeId: string;
  title: string;
  slug: string;
  mermaidPath: string;
  dotPath: string;
  summary: GraphSummary;
};

export type DiagramSet = {
  scopes: DiagramArtifact[];
  overview: DiagramArtifact | null;
  /** Peerings whose remote network appears in no scope of the inventory. */
  unresolvedPeerings: OverviewGraph["unresolvedPeerings"];
};

export type WriteDiagramOptions = {
  /** Overrides `config.outputDir`. */
  outputDir?: string;
  config?: ResolvedConfig;
  logger?: Logger;
};

const OVERVIEW_SLUG = "overview";

// =============================================================================
// Helpers
// =============================================================================

/** File-name-safe form of a scope name. */
export function slugify(text: string): string {
  return text.trim().replace(/[\s/\\:*?"<>|]+/g, "_");
}

/**
 * Slug per scope graph. Equal slugs are suffixed `_2`, `_3`, … in ascending
 * scope-ID order; `reserved` slugs are never handed out.
 */
export function assignSlugs(graphs: readonly TopologyGraph[], reserved: readonly string[] = []): Map<string, string> {
  const taken = new Set(reserved);
  const slugs = new Map<string, string>();

  for (const graph of [...graphs].sort((a, b) => compareIds(a.scopeId, b.scopeId))) {
    const base = slugify(graph.title) || slugify(graph.scopeId) || "scope";
    let slug = base;
    for (let n = 2; taken.has(slug); n++) slug = `${base}_${n}`;
    taken.add(slug);
    slugs.set(graph.scopeId, slug);
  }
  return slugs;
}

function addSummaries(a: GraphSummary, b: GraphSummary): GraphSummary {
  return {
    networks: a.networks + b.networks,
    subnets: a.subnets + b.subnets,
    virtualMachines: a.virtualMachines + b.virtualMachines,
    appliances: a.appliances + b.appliances,
    peeringLinks: a.peeringLinks + b.peeringLinks,
    unattached: a.unattached + b.unattached,
    peerings: a.peerings + b.peerings,
  };
}

const EMPTY_SUMMARY: GraphSummary = {
  networks: 0,
  subnets: 0,
  virtualMachines: 0,
  appliances: 0,
  peeringLinks: 0,
  unattached: 0,
  peerings: 0,
};

// =============================================================================
// Writer
// =============================================================================

/**
 * Write the full diagram set for an inventory. Existing files are
 * overwritten.
 *
 * @throws GraphValidationError when any scope graph is malformed; nothing
 *   is written in that case.
 */
export async function writeDiagramSet(inventory: Inventory, options: WriteDiagramOptions = {}): Promise<DiagramSet> {
  const config = options.config ?? resolveConfig();
  const outputDir = options.outputDir ?? config.outputDir;
  const log = options.logger ?? silentLogger;
  const serializer = { direction: config.direction, palette: config.palette };

  const graphs = buildScopeGraphs(inventory.records, inventory.scopes, {
    classifier: createClassifier(config.classification),
  });
  const overviewGraph = config.overview.enabled
    ? buildOverviewGraph(graphs, { maxNetworksPerScope: config.overview.maxNetworksPerScope })
    : null;

  const slugs = assignSlugs(graphs, overviewGraph ? [OVERVIEW_SLUG] : []);
  await mkdir(outputDir, { recursive: true });

  const write = async (
    graph: TopologyGraph,
    slug: string,
    summary: GraphSummary,
    heading?: string,
  ): Promise<DiagramArtifact> => {
    const mermaidPath = join(outputDir, `network_${slug}.mermaid.md`);
    const dotPath = join(outputDir, `network_${slug}.dot`);
    const markdown = toMermaidMarkdown(graph, heading ? { ...serializer, heading, summary } : { ...serializer, summary });

    await writeFile(mermaidPath, markdown, "utf8");
    await writeFile(dotPath, toDot(graph, serializer), "utf8");
    log.debug(`Wrote ${mermaidPath} and ${dotPath}`);

    return { scopeId: graph.scopeId, title: graph.title, slug, mermaidPath, dotPath, summary };
  };

  const scopes: DiagramArtifact[] = [];
  for (const graph of graphs) {
    scopes.push(await write(graph, slugs.get(graph.scopeId) ?? graph.scopeId, summarizeGraph(graph)));
  }

  let overview: DiagramArtifact | null = null;
  if (overviewGraph) {
    const total = scopes.map((a) => a.summary).reduce(addSummaries, EMPTY_SUMMARY);
    overview = await write(overviewGraph, OVERVIEW_SLUG, total, overviewGraph.title);
    for (const peering of overviewGraph.unresolvedPeerings) {
      log.warn(`[${peering.scopeId}] ${peering.networkId} peers with unknown network ${peering.remoteNetworkId}`);
    }
  }

  log.info(`Wrote ${scopes.length + (overview ? 1 : 0)} diagram(s) to ${outputDir}`);
  return { scopes, overview, unresolvedPeerings: overviewGraph?.unresolvedPeerings ?? [] };
}
