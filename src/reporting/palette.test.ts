import { describe, it, expect } from "vitest";
import { DEFAULT_PALETTE, styleFor, withStyles } from "./palette.js";

describe("styleFor", () => {
  it("falls back for categories without a style", () => {
    expect(styleFor("generic")).toEqual({ fill: "#f0f0f0", stroke: "#999999", fontColor: "#333333" });
    expect(styleFor("firewall").fontColor).toBe("#ffffff");
  });
});

describe("withStyles", () => {
  it("overlays partial overrides without touching the base", () => {
    const palette = withStyles({ database: { stroke: "#000000" }, generic: { fill: "#ffffff" } });

    expect(styleFor("database", palette)).toEqual({ fill: "#ffe1e1", stroke: "#000000", fontColor: "#1a1a1a" });
    expect(styleFor("generic", palette)).toEqual({ fill: "#ffffff", stroke: "#999999", fontColor: "#333333" });
    expect(styleFor("database", DEFAULT_PALETTE).stroke).toBe("#d94a4a");
    expect(Object.isFrozen(palette.styles)).toBe(true);
  });
});
