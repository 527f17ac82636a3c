import { describe, it, expect } from "vitest";
import { DEFAULT_CLASSIFICATION_RULES, DEFAULT_NAME_RULES, classify, createClassifier, withNameRules } from "./classifier.js";

describe("classify", () => {
  it("classifies by kind before looking at names", () => {
    expect(classify({ kind: "virtual-machine", name: "web-vm-01" })).toBe("compute");
    expect(classify({ kind: "load-balancer", name: "db-lb" })).toBe("load-balancer");
    expect(classify({ kind: "gateway", name: "vpn-gw" })).toBe("gateway");
    expect(classify({ kind: "firewall", name: "edge-fw" })).toBe("firewall");
    expect(classify({ kind: "peering-link", name: "hub-to-spoke" })).toBe("peering");
  });

  it("matches subnet and network names case-insensitively, first rule wins", () => {
    expect(classify({ kind: "subnet", name: "WebTier" })).toBe("web");
    expect(classify({ kind: "subnet", name: "frontend-subnet" })).toBe("web");
    expect(classify({ kind: "subnet", name: "app-subnet" })).toBe("app");
    expect(classify({ kind: "subnet", name: "application-tier" })).toBe("app");
    expect(classify({ kind: "network", name: "sql-vnet" })).toBe("database");
    // "web" is listed before "db"
    expect(classify({ kind: "subnet", name: "web-db" })).toBe("web");
  });

  it("has no default name rule shadowed by an earlier one", () => {
    const patterns = DEFAULT_NAME_RULES.map((r) => r.pattern);
    const shadowed = patterns.filter((p, i) => patterns.slice(0, i).some((earlier) => p.includes(earlier)));
    expect(shadowed).toEqual([]);
  });

  it("falls back to generic", () => {
    expect(classify({ kind: "subnet", name: "default" })).toBe("generic");
    expect(classify({ kind: "network", name: "" })).toBe("generic");
  });
});

describe("withNameRules", () => {
  it("replaces only the name rules", () => {
    const rules = withNameRules([{ pattern: "mgmt", category: "gateway" }]);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(rules.kindRules).toBe(DEFAULT_CLASSIFICATION_RULES.kindRules);

    const classifier = createClassifier(rules);
    expect(classifier({ kind: "subnet", name: "mgmt-subnet" })).toBe("gateway");
    expect(classifier({ kind: "subnet", name: "web-subnet" })).toBe("generic");
    expect(classifier({ kind: "virtual-machine", name: "mgmt-vm" })).toBe("compute");
  });

  it("leaves the defaults untouched", () => {
    withNameRules([]);
    expect(classify({ kind: "subnet", name: "web" })).toBe("web");
  });
});
