/**
 * Cloud Topology — Render Pipeline
 *
 * Renders a batch of diagram sources to image formats. Every (file, format)
 * pair runs independently: a failing pair is recorded with its diagnostics
 * and the batch carries on. Only a missing renderer binary stops the batch,
 * and that is detected once, before the first pair runs.
 */

import { mkdir, readdir } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { RenderInvocationError, RendererNotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../logging.js";
import { GraphvizRenderer } from "./graphviz.js";
import { processPooled } from "./pool.js";
import { IMAGE_FORMATS, type DiagramRenderer, type ImageFormat } from "./renderer.js";

// =============================================================================
// Types
// =============================================================================

export type RenderPair = {
  sourcePath: string;
  format: ImageFormat;
  outputPath: string;
};

export type RenderFailure = RenderPair & {
  /** Human-readable reason with the renderer's diagnostic text. */
  reason: string;
  error: RenderInvocationError;
};

export type BatchResult = {
  succeeded: RenderPair[];
  failed: RenderFailure[];
};

export type RenderBatchOptions = {
  renderer?: DiagramRenderer;
  /** Write outputs here instead of beside each source. */
  outputDir?: string;
  /** Concurrent renderer invocations (default: 4). */
  concurrency?: number;
  logger?: Logger;
  /** Stops scheduling further pairs; pairs not yet started are recorded as failed. */
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
};

// =============================================================================
// Helpers
// =============================================================================

/** `<dir>/<source basename>.<format>`, beside the source unless `outputDir` is given. */
export function outputPathFor(sourcePath: string, format: ImageFormat, outputDir?: string): string {
  const stem = basename(sourcePath, extname(sourcePath));
  return join(outputDir ?? dirname(sourcePath), `${stem}.${format}`);
}

/** `.dot` / `.gv` files directly inside `dir`, sorted by name. */
export async function listDiagramSources(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && /\.(dot|gv)$/i.test(e.name))
    .map((e) => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(dir, name));
}

function planPairs(sourceFiles: readonly string[], formats: Iterable<ImageFormat>, outputDir?: string): RenderPair[] {
  const wanted = new Set(formats);
  const ordered = IMAGE_FORMATS.filter((f) => wanted.has(f));
  const sources = [...new Set(sourceFiles)];

  const pairs: RenderPair[] = [];
  for (const sourcePath of sources) {
    for (const format of ordered) {
      pairs.push({ sourcePath, format, outputPath: outputPathFor(sourcePath, format, outputDir) });
    }
  }
  return pairs;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Render every (source, format) pair and report a full tally.
 *
 * @throws RendererNotFoundError when the renderer cannot run at all.
 */
export async function renderBatch(
  sourceFiles: readonly string[],
  formats: Iterable<ImageFormat>,
  options: RenderBatchOptions = {},
): Promise<BatchResult> {
  const renderer = options.renderer ?? new GraphvizRenderer();
  const log = options.logger ?? silentLogger;

  const probe = await renderer.probe();
  if (!probe.available) {
    throw new RendererNotFoundError(renderer.binary, probe.detail);
  }
  log.debug(`Renderer: ${probe.version || renderer.binary}`);

  const pairs = planPairs(sourceFiles, formats, options.outputDir);
  if (options.outputDir) await mkdir(options.outputDir, { recursive: true });

  // Two sources with the same stem would overwrite each other in a shared output dir.
  const claimed = new Map<string, string>();
  let completed = 0;

  const outcomes = await processPooled(
    pairs,
    async (pair): Promise<{ pair: RenderPair; error?: RenderInvocationError }> => {
      const finish = (error?: RenderInvocationError) => {
        completed++;
        options.onProgress?.(completed, pairs.length);
        return error ? { pair, error } : { pair };
      };

      if (options.signal?.aborted) {
        return finish(new RenderInvocationError("aborted", "batch cancelled before this pair started"));
      }

      const key = resolve(pair.outputPath);
      const owner = claimed.get(key);
      if (owner !== undefined && owner !== pair.sourcePath) {
        return finish(new RenderInvocationError("collision", `${pair.outputPath} is also produced by ${owner}`));
      }
      claimed.set(key, pair.sourcePath);

      log.debug(`Rendering ${pair.sourcePath} → ${pair.format}`);
      try {
        const outcome = await renderer.invoke(pair.sourcePath, pair.format, pair.outputPath);
        return finish(outcome.ok ? undefined : outcome.error);
      } catch (err: unknown) {
        return finish(new RenderInvocationError("spawn", err instanceof Error ? err.message : String(err)));
      }
    },
    options.concurrency ?? 4,
  );

  const result: BatchResult = { succeeded: [], failed: [] };
  for (const { pair, error } of outcomes) {
    if (error) {
      log.warn(`✗ ${pair.sourcePath} (${pair.format}): ${error.message}`);
      result.failed.push({ ...pair, reason: error.message, error });
    } else {
      log.info(`✓ Generated: ${pair.outputPath}`);
      result.succeeded.push(pair);
    }
  }

  return result;
}
