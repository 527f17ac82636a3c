/**
 * Cloud Topology — Entry Point
 *
 * Builds network topology graphs from a flat cloud inventory and writes
 * them as Mermaid and Graphviz diagrams, optionally rendered to images.
 */

export type {
  ResourceKind,
  ResourceRecord,
  ScopeInfo,
  NodeCategory,
  GraphNodeKind,
  NodePlacement,
  GraphNode,
  GraphEdgeKind,
  GraphEdge,
  ExternalPeering,
  TopologyGraph,
  OverviewGraph,
  GraphSummary,
} from "./src/types.js";
export { RESOURCE_KINDS, APPLIANCE_KINDS, ATTRIBUTE_KEYS } from "./src/types.js";

// Graph construction
export {
  buildTopologyGraph,
  buildScopeGraphs,
  summarizeGraph,
  compareIds,
  unassignedNodeId,
} from "./src/core/builder.js";
export type { BuildOptions } from "./src/core/builder.js";
export { buildOverviewGraph, OVERVIEW_SCOPE_ID } from "./src/core/overview.js";
export type { OverviewOptions } from "./src/core/overview.js";
export {
  classify,
  createClassifier,
  withNameRules,
  DEFAULT_CLASSIFICATION_RULES,
  DEFAULT_NAME_RULES,
} from "./src/core/classifier.js";
export type { Classifier, ClassificationRules, NameRule } from "./src/core/classifier.js";
export { parseCidr, parseIpAddress, containsAddress, isStrictSuperset } from "./src/core/cidr.js";

// Serializers
export { toMermaid, toMermaidMarkdown, scopeMarkdown, escapeMermaid } from "./src/reporting/mermaid.js";
export type { MermaidOptions, MermaidMarkdownOptions } from "./src/reporting/mermaid.js";
export { toDot, escapeDot } from "./src/reporting/dot.js";
export type { DotOptions } from "./src/reporting/dot.js";
export { sanitizeIdentifier, createIdentifierMap, MAX_IDENTIFIER_LENGTH } from "./src/reporting/identifiers.js";
export { DEFAULT_PALETTE, CATEGORY_LEGEND, styleFor, withStyles } from "./src/reporting/palette.js";
export type { CategoryPalette, NodeStyle } from "./src/reporting/palette.js";

// Rendering
export { renderBatch, listDiagramSources, outputPathFor } from "./src/render/pipeline.js";
export type { BatchResult, RenderBatchOptions, RenderFailure, RenderPair } from "./src/render/pipeline.js";
export { GraphvizRenderer } from "./src/render/graphviz.js";
export type { GraphvizOptions } from "./src/render/graphviz.js";
export { IMAGE_FORMATS, parseFormats } from "./src/render/renderer.js";
export type { DiagramRenderer, ImageFormat, RenderOutcome, RendererProbe } from "./src/render/renderer.js";

// Input, output and configuration
export { parseInventory, loadInventory } from "./src/inventory.js";
export type { Inventory } from "./src/inventory.js";
export { writeDiagramSet, slugify } from "./src/writer.js";
export type { DiagramArtifact, DiagramSet, WriteDiagramOptions } from "./src/writer.js";
export { getDefaultConfig, loadConfig, resolveConfig, validateConfig } from "./src/config.js";
export type { ResolvedConfig, TopologyConfig } from "./src/config.js";
export { createSubsystemLogger, silentLogger } from "./src/logging.js";
export type { Logger } from "./src/logging.js";
export {
  GraphValidationError,
  RenderInvocationError,
  RendererNotFoundError,
  InventoryValidationError,
  ConfigValidationError,
} from "./src/errors.js";
export { registerTopologyCli } from "./src/cli/cli.js";
export type { CliContext, TopologyCliDeps } from "./src/cli/cli.js";
