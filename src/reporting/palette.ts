/**
 * Category → color lookup shared by both diagram serializers.
 */

import type { NodeCategory } from "../types.js";

export type NodeStyle = {
  fill: string;
  stroke: string;
  fontColor: string;
};

export type CategoryPalette = {
  readonly styles: Readonly<Partial<Record<NodeCategory, Readonly<NodeStyle>>>>;
  /** Used for every category without an entry. */
  readonly fallback: Readonly<NodeStyle>;
};

/** Legend order and wording. */
export const CATEGORY_LEGEND: ReadonlyArray<readonly [NodeCategory, string]> = [
  ["web", "Web / frontend tier"],
  ["app", "Application tier"],
  ["database", "Data tier"],
  ["compute", "Virtual machines"],
  ["load-balancer", "Load balancers"],
  ["gateway", "Gateways"],
  ["firewall", "Firewalls"],
  ["peering", "Peering links"],
  ["generic", "Other networks, subnets and containers"],
];

export const DEFAULT_PALETTE = Object.freeze<CategoryPalette>({
  styles: Object.freeze({
    web: Object.freeze({ fill: "#e1f5ff", stroke: "#4a90d9", fontColor: "#1a1a1a" }),
    app: Object.freeze({ fill: "#fff4e1", stroke: "#d9a54a", fontColor: "#1a1a1a" }),
    database: Object.freeze({ fill: "#ffe1e1", stroke: "#d94a4a", fontColor: "#1a1a1a" }),
    compute: Object.freeze({ fill: "#90ee90", stroke: "#3f8624", fontColor: "#1a1a1a" }),
    "load-balancer": Object.freeze({ fill: "#ffb6c1", stroke: "#e7157b", fontColor: "#1a1a1a" }),
    gateway: Object.freeze({ fill: "#dda0dd", stroke: "#8c4fff", fontColor: "#1a1a1a" }),
    firewall: Object.freeze({ fill: "#ff6347", stroke: "#dd344c", fontColor: "#ffffff" }),
    peering: Object.freeze({ fill: "#e8e0ff", stroke: "#7b61ff", fontColor: "#1a1a1a" }),
  }),
  fallback: Object.freeze({ fill: "#f0f0f0", stroke: "#999999", fontColor: "#333333" }),
});

/** Style for a category; never undefined. */
export function styleFor(category: NodeCategory, palette: CategoryPalette = DEFAULT_PALETTE): Readonly<NodeStyle> {
  return palette.styles[category] ?? palette.fallback;
}

/** Overlay per-category overrides onto a base palette. */
export function withStyles(
  overrides: Partial<Record<NodeCategory, Partial<NodeStyle>>>,
  base: CategoryPalette = DEFAULT_PALETTE,
): CategoryPalette {
  const styles: Partial<Record<NodeCategory, Readonly<NodeStyle>>> = { ...base.styles };
  for (const [category] of CATEGORY_LEGEND) {
    const override = overrides[category];
    if (override) styles[category] = Object.freeze({ ...(base.styles[category] ?? base.fallback), ...override });
  }
  return Object.freeze({ styles: Object.freeze(styles), fallback: base.fallback });
}
