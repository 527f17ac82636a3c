import { describe, it, expect } from "vitest";
import { buildTopologyGraph } from "../core/builder.js";
import { makeRecord, permutations, sampleRecords } from "../testing.js";
import { escapeMermaid, scopeMarkdown, toMermaid, toMermaidMarkdown } from "./mermaid.js";
import { withStyles } from "./palette.js";

function smallGraph() {
  return buildTopologyGraph(
    [
      makeRecord({ id: "N1", kind: "network", name: "hub", addressSpace: "10.0.0.0/16" }),
      makeRecord({ id: "S1", kind: "subnet", name: "subnet-1", addressSpace: "10.0.1.0/24", parentRef: "N1" }),
      makeRecord({ id: "V1", kind: "virtual-machine", name: "web-vm-01", attachmentRef: "S1" }),
    ],
    "prod",
  );
}

const SMALL_FLOWCHART = [
  "flowchart TB",
  "%% prod",
  '  subgraph N1["hub<br/>10.0.0.0/16"]',
  '    S1(["subnet-1<br/>10.0.1.0/24"])',
  "    style S1 fill:#f0f0f0,stroke:#999999,color:#333333",
  "  end",
  "  style N1 fill:#f0f0f0,stroke:#999999,color:#333333",
  '  V1["web-vm-01"]',
  "  style V1 fill:#90ee90,stroke:#3f8624,color:#1a1a1a",
  "",
  "  S1 --> V1",
  "",
].join("\n");

describe("escapeMermaid", () => {
  it("replaces characters that break quoted labels with entity codes", () => {
    expect(escapeMermaid('a "b" <c> | #1')).toBe("a #quot;b#quot; #lt;c#gt; #124; #35;1");
  });

  it("collapses line breaks", () => {
    expect(escapeMermaid("line one\nline two\r\n")).toBe("line one line two");
  });
});

describe("toMermaid", () => {
  it("emits groups, leaves, styles and edges", () => {
    expect(toMermaid(smallGraph())).toBe(SMALL_FLOWCHART);
  });

  it("honors direction and palette overrides", () => {
    const text = toMermaid(smallGraph(), { direction: "LR", palette: withStyles({ compute: { fill: "#000000" } }) });
    const lines = text.split("\n");
    expect(lines[0]).toBe("flowchart LR");
    expect(lines).toContain("  style V1 fill:#000000,stroke:#3f8624,color:#1a1a1a");
  });

  it("draws peerings as dotted links with their state", () => {
    const graph = buildTopologyGraph(
      [
        makeRecord({ id: "a", kind: "network", attributes: { peeredNetworkIds: ["b"] } }),
        makeRecord({ id: "b", kind: "network" }),
        makeRecord({ id: "c", kind: "network" }),
        makeRecord({
          id: "link",
          kind: "peering-link",
          name: "c-to-a",
          parentRef: "c",
          attributes: { remoteNetworkId: "a", peeringState: "Initiated" },
        }),
      ],
      "prod",
    );
    const lines = toMermaid(graph).split("\n");
    expect(lines).toContain("  a -.- b");
    expect(lines).toContain('  a -.-|"Initiated"| c');
    expect(lines).toContain('    link>"c-to-a<br/>Initiated"]');
  });

  it("puts orphans in the unassigned group", () => {
    const lines = toMermaid(buildTopologyGraph(sampleRecords(), "prod")).split("\n");
    expect(lines).toContain('  subgraph unassigned_prod["Unassigned<br/>2 resources"]');
    expect(lines).toContain('    fw_edge[["edge-fw<br/>172.16.0.4"]]');
    expect(lines).toContain('  lb_web{{"web-lb<br/>Standard"}}');
  });

  it("produces identical text for any record order", () => {
    const records = sampleRecords();
    const expected = toMermaid(buildTopologyGraph(records, "prod"));
    for (const order of permutations(records)) {
      expect(toMermaid(buildTopologyGraph(order, "prod"))).toBe(expected);
    }
  });
});

describe("toMermaidMarkdown", () => {
  it("wraps the flowchart with a legend of the categories in use", () => {
    expect(toMermaidMarkdown(smallGraph())).toBe(
      [
        "# Network Topology: prod",
        "",
        "```mermaid",
        SMALL_FLOWCHART.trimEnd(),
        "```",
        "",
        "## Legend",
        "",
        "- **Virtual machines**: `#90ee90`",
        "- **Other networks, subnets and containers**: `#f0f0f0`",
        "- **Solid arrows**: subnet attachments",
        "",
      ].join("\n"),
    );
  });

  it("appends the scope summary", () => {
    const text = scopeMarkdown(smallGraph());
    expect(text.endsWith(
      [
        "## Summary",
        "",
        "- **Networks**: 1",
        "- **Subnets**: 1",
        "- **Virtual machines**: 1",
        "- **Appliances**: 0",
        "- **Unattached resources**: 0",
        "- **Peerings**: 0",
        "",
      ].join("\n"),
    )).toBe(true);
  });

  it("uses a custom heading", () => {
    expect(toMermaidMarkdown(smallGraph(), { heading: "Network Overview" }).split("\n")[0]).toBe("# Network Overview");
  });
});
