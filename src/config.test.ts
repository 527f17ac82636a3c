import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getDefaultConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import { ConfigValidationError } from "./errors.js";
import { DEFAULT_PALETTE } from "./reporting/palette.js";

describe("validateConfig", () => {
  it("accepts the defaults and an empty object", () => {
    expect(validateConfig(getDefaultConfig()).valid).toBe(true);
    expect(validateConfig({}).valid).toBe(true);
  });

  it("lists every violation with its path", () => {
    const result = validateConfig({ direction: "UP", render: { concurrency: 0 } });
    expect(result.valid).toBe(false);
    expect(result.errors?.some((e) => e.startsWith("/direction:"))).toBe(true);
    expect(result.errors?.some((e) => e.startsWith("/render/concurrency:"))).toBe(true);
  });
});

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig();
    expect(config.outputDir).toBe("docs/diagrams");
    expect(config.direction).toBe("TB");
    expect(config.overview).toEqual({ enabled: true, maxNetworksPerScope: 5 });
    expect(config.render).toEqual({ formats: ["png", "svg"], timeoutMs: 60_000, concurrency: 4, binary: "dot" });
    expect(config.palette).toBe(DEFAULT_PALETTE);
    expect(config.classification.nameRules.map((r) => r.pattern)).toEqual([
      "web",
      "frontend",
      "app",
      "db",
      "data",
      "sql",
    ]);
  });

  it("applies name rules and palette overrides", () => {
    const config = resolveConfig({
      classification: { nameRules: [{ pattern: "edge", category: "firewall" }] },
      palette: { web: { fill: "#123456" } },
      overview: { maxNetworksPerScope: 0 },
    });
    expect(config.classification.nameRules).toEqual([{ pattern: "edge", category: "firewall" }]);
    expect(config.palette.styles.web).toEqual({ fill: "#123456", stroke: "#4a90d9", fontColor: "#1a1a1a" });
    expect(config.overview).toEqual({ enabled: true, maxNetworksPerScope: 0 });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "topology-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a valid file", async () => {
    const path = join(dir, "topology.json");
    await writeFile(path, JSON.stringify({ direction: "LR", render: { formats: ["svg"] } }));
    await expect(loadConfig(path)).resolves.toEqual({ direction: "LR", render: { formats: ["svg"] } });
  });

  it("rejects malformed JSON and schema violations", async () => {
    const broken = join(dir, "broken.json");
    await writeFile(broken, "{ direction: ");
    await expect(loadConfig(broken)).rejects.toBeInstanceOf(ConfigValidationError);

    const invalid = join(dir, "invalid.json");
    await writeFile(invalid, JSON.stringify({ overview: { enabled: "yes" } }));
    await expect(loadConfig(invalid)).rejects.toThrow(`Invalid configuration (${invalid}):`);
  });
});
