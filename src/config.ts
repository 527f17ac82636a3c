/**
 * Configuration schema (TypeBox) and defaults.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigValidationError } from "./errors.js";
import { DEFAULT_NAME_RULES, withNameRules, type ClassificationRules } from "./core/classifier.js";
import { DEFAULT_PALETTE, withStyles, type CategoryPalette, type NodeStyle } from "./reporting/palette.js";
import type { ImageFormat } from "./render/renderer.js";
import type { NodeCategory } from "./types.js";

const CategorySchema = Type.Union([
  Type.Literal("web"),
  Type.Literal("app"),
  Type.Literal("database"),
  Type.Literal("compute"),
  Type.Literal("load-balancer"),
  Type.Literal("gateway"),
  Type.Literal("firewall"),
  Type.Literal("peering"),
  Type.Literal("generic"),
]);

const FormatSchema = Type.Union([Type.Literal("png"), Type.Literal("svg"), Type.Literal("pdf")]);

const StyleSchema = Type.Object({
  fill: Type.Optional(Type.String()),
  stroke: Type.Optional(Type.String()),
  fontColor: Type.Optional(Type.String()),
});

export const configSchema = Type.Object({
  outputDir: Type.Optional(Type.String({ description: "Directory diagrams are written to" })),
  direction: Type.Optional(Type.Union([Type.Literal("TB"), Type.Literal("LR")])),
  overview: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      maxNetworksPerScope: Type.Optional(
        Type.Integer({ minimum: 0, description: "Networks shown per scope in the overview (0 = all)" }),
      ),
    }),
  ),
  classification: Type.Optional(
    Type.Object({
      nameRules: Type.Optional(
        Type.Array(Type.Object({ pattern: Type.String({ minLength: 1 }), category: CategorySchema })),
      ),
    }),
  ),
  palette: Type.Optional(
    Type.Object({
      web: Type.Optional(StyleSchema),
      app: Type.Optional(StyleSchema),
      database: Type.Optional(StyleSchema),
      compute: Type.Optional(StyleSchema),
      "load-balancer": Type.Optional(StyleSchema),
      gateway: Type.Optional(StyleSchema),
      firewall: Type.Optional(StyleSchema),
      peering: Type.Optional(StyleSchema),
      generic: Type.Optional(StyleSchema),
    }),
  ),
  render: Type.Optional(
    Type.Object({
      formats: Type.Optional(Type.Array(FormatSchema)),
      timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
      concurrency: Type.Optional(Type.Integer({ minimum: 1 })),
      binary: Type.Optional(Type.String({ minLength: 1 })),
    }),
  ),
  logging: Type.Optional(
    Type.Object({
      verbose: Type.Optional(Type.Boolean()),
    }),
  ),
});

export type TopologyConfig = Static<typeof configSchema>;

/** Fully populated configuration with rule sets ready to use. */
export type ResolvedConfig = {
  outputDir: string;
  direction: "TB" | "LR";
  overview: { enabled: boolean; maxNetworksPerScope: number };
  classification: ClassificationRules;
  palette: CategoryPalette;
  render: { formats: ImageFormat[]; timeoutMs: number; concurrency: number; binary: string };
  logging: { verbose: boolean };
};

export function getDefaultConfig(): TopologyConfig {
  return {
    outputDir: "docs/diagrams",
    direction: "TB",
    overview: { enabled: true, maxNetworksPerScope: 5 },
    classification: { nameRules: DEFAULT_NAME_RULES.map((r) => ({ ...r })) },
    render: { formats: ["png", "svg"], timeoutMs: 60_000, concurrency: 4, binary: "dot" },
    logging: { verbose: false },
  };
}

/** Validate a parsed JSON value against the schema. */
export function validateConfig(value: unknown): { valid: boolean; errors?: string[]; config?: TopologyConfig } {
  if (Check(configSchema, value)) {
    return { valid: true, config: value };
  }
  const errors: string[] = [];
  for (const error of Errors(configSchema, value)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  return { valid: false, errors: errors.length > 0 ? errors : ["Configuration does not match schema"] };
}

/** Merge a partial configuration over the defaults. */
export function resolveConfig(config: TopologyConfig = {}): ResolvedConfig {
  const defaults = getDefaultConfig();
  const nameRules = config.classification?.nameRules ?? defaults.classification?.nameRules ?? [];
  const palette: Partial<Record<NodeCategory, Partial<NodeStyle>>> = config.palette ?? {};

  return {
    outputDir: config.outputDir ?? defaults.outputDir ?? "docs/diagrams",
    direction: config.direction ?? "TB",
    overview: {
      enabled: config.overview?.enabled ?? true,
      maxNetworksPerScope: config.overview?.maxNetworksPerScope ?? 5,
    },
    classification: withNameRules(nameRules),
    palette: Object.keys(palette).length > 0 ? withStyles(palette) : DEFAULT_PALETTE,
    render: {
      formats: config.render?.formats ?? ["png", "svg"],
      timeoutMs: config.render?.timeoutMs ?? 60_000,
      concurrency: config.render?.concurrency ?? 4,
      binary: config.render?.binary ?? "dot",
    },
    logging: { verbose: config.logging?.verbose ?? false },
  };
}

/**
 * Read and validate a JSON configuration file.
 *
 * @throws ConfigValidationError when the file is not valid JSON or does not
 *   match the schema.
 */
export async function loadConfig(path: string): Promise<TopologyConfig> {
  const raw = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(path, [`(root): ${err instanceof Error ? err.message : String(err)}`]);
  }

  const result = validateConfig(parsed);
  if (!result.config) {
    throw new ConfigValidationError(path, result.errors ?? []);
  }
  return result.config;
}
