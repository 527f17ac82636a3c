/**
 * Cloud Topology — CLI Commands
 *
 * Registers the `diagrams` and `render` commands.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig, resolveConfig, type ResolvedConfig } from "../config.js";
import { RendererNotFoundError } from "../errors.js";
import { loadInventory } from "../inventory.js";
import type { Logger } from "../logging.js";
import { GraphvizRenderer, type GraphvizOptions } from "../render/graphviz.js";
import { listDiagramSources, renderBatch, type BatchResult } from "../render/pipeline.js";
import { parseFormats, type DiagramRenderer, type ImageFormat } from "../render/renderer.js";
import { writeDiagramSet, type DiagramSet } from "../writer.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  config?: unknown;
  logger: { info: (msg: string) => void; warn: (msg: string) => void; error: (msg: string) => void };
};

export type TopologyCliDeps = {
  /** Renderer factory; tests pass a fake. */
  createRenderer?: (options: GraphvizOptions) => DiagramRenderer;
};

type DiagramsOptions = {
  out?: string;
  config?: string;
  overview: boolean;
  render?: string | true;
  verbose?: boolean;
};

type RenderOptions = {
  formats: string;
  out?: string;
  timeout?: string;
  concurrency?: string;
  dot?: string;
  verbose?: boolean;
};

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Positive integer option, or the fallback when absent or malformed. */
function intOption(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Route library log output through the CLI logger; debug only when verbose. */
function commandLogger(ctx: CliContext, verbose: boolean): Logger {
  return {
    debug: (msg) => {
      if (verbose) ctx.logger.info(msg);
    },
    info: (msg) => ctx.logger.info(msg),
    warn: (msg) => ctx.logger.warn(msg),
    error: (msg) => ctx.logger.error(msg),
  };
}

/**
 * Render sources and print the tally. Returns false when the renderer is
 * unavailable, which is the only failure that should fail the command.
 */
async function runRender(
  ctx: CliContext,
  deps: TopologyCliDeps,
  sources: readonly string[],
  formats: readonly ImageFormat[],
  settings: ResolvedConfig["render"] & { outputDir?: string; verbose: boolean },
): Promise<boolean> {
  const rendererOptions: GraphvizOptions = { binary: settings.binary, timeoutMs: settings.timeoutMs };
  const renderer = deps.createRenderer?.(rendererOptions) ?? new GraphvizRenderer(rendererOptions);

  let result: BatchResult;
  try {
    result = await renderBatch(sources, formats, {
      renderer,
      concurrency: settings.concurrency,
      logger: commandLogger(ctx, settings.verbose),
      ...(settings.outputDir !== undefined ? { outputDir: settings.outputDir } : {}),
    });
  } catch (err) {
    if (err instanceof RendererNotFoundError) {
      ctx.logger.error(err.message);
      return false;
    }
    throw err;
  }

  const total = result.succeeded.length + result.failed.length;
  console.log(`\nRendered ${result.succeeded.length} of ${total} image(s)`);

  if (result.failed.length > 0) {
    console.log(`\n${result.failed.length} failed:\n`);
    console.log(
      table(
        ["Source", "Format", "Reason"],
        result.failed.map((f) => [f.sourcePath, f.format, f.error.diagnostics.split("\n")[0] ?? f.reason]),
      ),
    );
  }
  return true;
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register the topology commands on `ctx.program`.
 */
export function registerTopologyCli(ctx: CliContext, deps: TopologyCliDeps = {}): void {
  // ---------------------------------------------------------------------------
  // diagrams <inventory>
  // ---------------------------------------------------------------------------
  ctx.program
    .command("diagrams")
    .description("Build network topology diagrams (Mermaid + DOT) from an inventory file")
    .argument("<inventory>", "Inventory JSON file")
    .option("-o, --out <dir>", "Output directory (default: docs/diagrams)")
    .option("-c, --config <file>", "Configuration JSON file")
    .option("--no-overview", "Skip the cross-scope overview diagram")
    .option("--render [formats]", "Render the DOT files afterwards (default formats: png,svg)")
    .option("-v, --verbose", "Verbose logging")
    .action(async (inventoryPath: string, opts: DiagramsOptions) => {
      let config: ResolvedConfig;
      try {
        config = resolveConfig(opts.config ? await loadConfig(resolve(opts.config)) : {});
      } catch (err) {
        ctx.logger.error(errorMessage(err));
        process.exitCode = 1;
        return;
      }
      if (!opts.overview) config = { ...config, overview: { ...config.overview, enabled: false } };

      let formats: ImageFormat[] = [];
      if (opts.render !== undefined) {
        const parsed = opts.render === true ? { formats: config.render.formats, invalid: [] } : parseFormats(opts.render);
        if (parsed.invalid.length > 0 || parsed.formats.length === 0) {
          ctx.logger.error(`Unknown format(s): ${parsed.invalid.join(", ") || "(none given)"}. Use png, svg or pdf.`);
          process.exitCode = 1;
          return;
        }
        formats = parsed.formats;
      }

      const verbose = opts.verbose ?? config.logging.verbose;
      const outputDir = opts.out ?? config.outputDir;

      let set: DiagramSet;
      try {
        const inventory = await loadInventory(resolve(inventoryPath));
        set = await writeDiagramSet(inventory, { outputDir, config, logger: commandLogger(ctx, verbose) });
      } catch (err) {
        ctx.logger.error(errorMessage(err));
        process.exitCode = 1;
        return;
      }

      console.log(`\nNetwork diagrams: ${outputDir}\n`);
      console.log(
        table(
          ["Scope", "Networks", "Subnets", "VMs", "Appliances", "Unattached", "Peerings", "File"],
          set.scopes.map((a) => [
            a.title,
            String(a.summary.networks),
            String(a.summary.subnets),
            String(a.summary.virtualMachines),
            String(a.summary.appliances),
            String(a.summary.unattached),
            String(a.summary.peerings),
            `network_${a.slug}`,
          ]),
        ),
      );
      if (set.overview) console.log(`\nOverview: ${set.overview.mermaidPath}`);

      if (formats.length > 0) {
        const dotFiles = [...set.scopes, ...(set.overview ? [set.overview] : [])].map((a) => a.dotPath);
        const ok = await runRender(ctx, deps, dotFiles, formats, { ...config.render, verbose });
        if (!ok) process.exitCode = 1;
      }
    });

  // ---------------------------------------------------------------------------
  // render [dir]
  // ---------------------------------------------------------------------------
  ctx.program
    .command("render")
    .description("Render DOT files in a directory to images with Graphviz")
    .argument("[dir]", "Directory holding .dot files", "docs/diagrams")
    .option("-f, --formats <list>", "Comma-separated formats: png, svg, pdf", "png,svg")
    .option("-o, --out <dir>", "Write images here instead of beside each source")
    .option("--timeout <ms>", "Per-invocation timeout in milliseconds")
    .option("--concurrency <n>", "Concurrent renderer invocations")
    .option("--dot <binary>", "Graphviz binary to run")
    .option("-v, --verbose", "Verbose logging")
    .action(async (dir: string, opts: RenderOptions) => {
      const defaults = resolveConfig().render;
      const { formats, invalid } = parseFormats(opts.formats);
      if (invalid.length > 0) ctx.logger.warn(`Ignoring unknown format(s): ${invalid.join(", ")}`);
      if (formats.length === 0) {
        ctx.logger.warn("No formats to render.");
        return;
      }

      const sourceDir = resolve(dir);
      if (!existsSync(sourceDir)) {
        ctx.logger.warn(`Directory not found: ${sourceDir}`);
        return;
      }
      const sources = await listDiagramSources(sourceDir);
      if (sources.length === 0) {
        ctx.logger.warn(`No .dot files found in ${sourceDir}`);
        return;
      }

      console.error(`Rendering ${sources.length} file(s) as ${formats.join(", ")}...`);
      const ok = await runRender(ctx, deps, sources, formats, {
        formats,
        binary: opts.dot ?? defaults.binary,
        timeoutMs: intOption(opts.timeout, defaults.timeoutMs),
        concurrency: intOption(opts.concurrency, defaults.concurrency),
        verbose: opts.verbose ?? false,
        ...(opts.out !== undefined ? { outputDir: resolve(opts.out) } : {}),
      });
      if (!ok) process.exitCode = 1;
    });
}
