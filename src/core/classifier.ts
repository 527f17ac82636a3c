/**
 * Cloud Topology — Resource Classifier
 *
 * Maps an inventory record to the visual category its diagram node is drawn
 * with. Kind rules are evaluated first; name rules only ever apply to
 * networks and subnets, in list order, first match wins.
 */

import type { NodeCategory, ResourceKind, ResourceRecord } from "../types.js";

// =============================================================================
// Rule Sets
// =============================================================================

export type NameRule = {
  /** Case-insensitive substring matched against the record name. */
  pattern: string;
  category: NodeCategory;
};

export type ClassificationRules = {
  readonly kindRules: Readonly<Partial<Record<ResourceKind, NodeCategory>>>;
  readonly nameRules: readonly Readonly<NameRule>[];
  /** Kinds the name rules are applied to. */
  readonly nameRuleKinds: readonly ResourceKind[];
  readonly fallback: NodeCategory;
};

export const DEFAULT_NAME_RULES: readonly Readonly<NameRule>[] = Object.freeze([
  Object.freeze({ pattern: "web", category: "web" }),
  Object.freeze({ pattern: "frontend", category: "web" }),
  Object.freeze({ pattern: "app", category: "app" }),
  Object.freeze({ pattern: "db", category: "database" }),
  Object.freeze({ pattern: "data", category: "database" }),
  Object.freeze({ pattern: "sql", category: "database" }),
] satisfies NameRule[]);

export const DEFAULT_CLASSIFICATION_RULES = Object.freeze<ClassificationRules>({
  kindRules: Object.freeze({
    "virtual-machine": "compute",
    "load-balancer": "load-balancer",
    gateway: "gateway",
    firewall: "firewall",
    "peering-link": "peering",
  }),
  nameRules: DEFAULT_NAME_RULES,
  nameRuleKinds: Object.freeze(["subnet", "network"] satisfies ResourceKind[]),
  fallback: "generic",
});

/**
 * Derive a frozen rule set from the defaults with the name rules replaced.
 */
export function withNameRules(
  nameRules: readonly NameRule[],
  base: ClassificationRules = DEFAULT_CLASSIFICATION_RULES,
): ClassificationRules {
  return Object.freeze<ClassificationRules>({
    ...base,
    nameRules: Object.freeze(nameRules.map((r) => Object.freeze({ ...r }))),
  });
}

// =============================================================================
// Classification
// =============================================================================

export type Classifier = (record: Pick<ResourceRecord, "kind" | "name">) => NodeCategory;

/** Classify a single record. Total: unmatched records get `rules.fallback`. */
export function classify(
  record: Pick<ResourceRecord, "kind" | "name">,
  rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES,
): NodeCategory {
  const byKind = rules.kindRules[record.kind];
  if (byKind) return byKind;

  if (rules.nameRuleKinds.includes(record.kind)) {
    const name = record.name.toLowerCase();
    for (const rule of rules.nameRules) {
      if (rule.pattern && name.includes(rule.pattern.toLowerCase())) {
        return rule.category;
      }
    }
  }

  return rules.fallback;
}

/** Bind a rule set into a reusable classifier. */
export function createClassifier(rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES): Classifier {
  return (record) => classify(record, rules);
}
