/**
 * Error classes raised by graph construction, input loading and rendering.
 */

/** Structural defects found while constructing a topology graph. */
export type GraphValidationCode = "duplicate-node" | "dangling-edge" | "containment-cycle";

export class GraphValidationError extends Error {
  readonly code: GraphValidationCode;
  readonly scopeId: string;
  /** Offending node IDs (both endpoints for dangling edges, the loop for cycles). */
  readonly nodeIds: readonly string[];

  constructor(code: GraphValidationCode, scopeId: string, nodeIds: readonly string[], message: string) {
    super(`[${scopeId}] ${message}`);
    this.name = "GraphValidationError";
    this.code = code;
    this.scopeId = scopeId;
    this.nodeIds = nodeIds;
  }
}

export type RenderFailureReason = "exit-code" | "timeout" | "spawn" | "aborted" | "collision";

/** One (file, format) render that did not produce output. Recoverable. */
export class RenderInvocationError extends Error {
  readonly reason: RenderFailureReason;
  readonly exitCode: number | null;
  /** Captured stderr / stdout of the renderer, trimmed. */
  readonly diagnostics: string;

  constructor(reason: RenderFailureReason, diagnostics: string, exitCode: number | null = null) {
    super(
      reason === "exit-code"
        ? `Renderer exited with code ${exitCode ?? "?"}: ${diagnostics}`
        : `Renderer ${reason}: ${diagnostics}`,
    );
    this.name = "RenderInvocationError";
    this.reason = reason;
    this.exitCode = exitCode;
    this.diagnostics = diagnostics;
  }
}

/** The renderer binary cannot be found. Aborts the batch before any pair runs. */
export class RendererNotFoundError extends Error {
  readonly binary: string;

  constructor(binary: string, detail?: string) {
    super(
      [
        `Renderer "${binary}" not found${detail ? ` (${detail})` : ""}.`,
        "Install Graphviz:",
        "  macOS:   brew install graphviz",
        "  Linux:   sudo apt-get install graphviz",
        "  Windows: https://graphviz.org/download/",
      ].join("\n"),
    );
    this.name = "RendererNotFoundError";
    this.binary = binary;
  }
}

/** A JSON document failed schema validation. */
class SchemaValidationError extends Error {
  readonly source: string;
  /** `path: message` entries, one per violation. */
  readonly issues: readonly string[];

  constructor(kind: string, source: string, issues: readonly string[]) {
    super(`Invalid ${kind} (${source}):\n  ${issues.join("\n  ")}`);
    this.source = source;
    this.issues = issues;
  }
}

export class InventoryValidationError extends SchemaValidationError {
  constructor(source: string, issues: readonly string[]) {
    super("inventory", source, issues);
    this.name = "InventoryValidationError";
  }
}

export class ConfigValidationError extends SchemaValidationError {
  constructor(source: string, issues: readonly string[]) {
    super("configuration", source, issues);
    this.name = "ConfigValidationError";
  }
}
