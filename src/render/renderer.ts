/**
 * Renderer contract used by the render pipeline.
 *
 * The pipeline only ever talks to this interface, so batching and failure
 * aggregation can be exercised with an in-process fake.
 */

import type { RenderInvocationError } from "../errors.js";

export type ImageFormat = "png" | "svg" | "pdf";

/** Canonical processing order. */
export const IMAGE_FORMATS: readonly ImageFormat[] = ["png", "svg", "pdf"];

export function isImageFormat(value: string): value is ImageFormat {
  return IMAGE_FORMATS.some((f) => f === value);
}

/**
 * Parse a comma-separated format list (`"png,svg"`). Unknown entries are
 * returned separately so callers can report them.
 */
export function parseFormats(list: string): { formats: ImageFormat[]; invalid: string[] } {
  const requested = new Set<ImageFormat>();
  const invalid: string[] = [];
  for (const raw of list.split(",")) {
    const entry = raw.trim().toLowerCase();
    if (!entry) continue;
    if (isImageFormat(entry)) requested.add(entry);
    else invalid.push(entry);
  }
  return { formats: IMAGE_FORMATS.filter((f) => requested.has(f)), invalid };
}

export type RenderOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; error: RenderInvocationError };

export type RendererProbe =
  | { available: true; version: string }
  | { available: false; detail: string };

export interface DiagramRenderer {
  /** Binary (or display name) reported in errors. */
  readonly binary: string;
  /** Check once whether the renderer can run at all. */
  probe(): Promise<RendererProbe>;
  /** Render one source file to one format, writing `outputPath`. */
  invoke(sourcePath: string, format: ImageFormat, outputPath: string): Promise<RenderOutcome>;
}
