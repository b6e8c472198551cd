import { describe, expect, it } from "vitest";
import { at, makeSpan } from "./__tests__/spanFactory.js";
import {
  allNodesPreorder,
  ancestorsOf,
  buildSpanForest,
  collectSpans,
  expandAncestors,
  flattenForest,
  toggleExpanded,
} from "./tree.js";

function names(nodes: Array<{ span: { name: string } }>): string[] {
  return nodes.map((node) => node.span.name);
}

const sampleSpans = [
  makeSpan({ name: "root", spanId: "r", parentId: "0000000000000000", start: at(0), end: at(1000) }),
  makeSpan({ name: "second", spanId: "s", parentId: "r", start: at(500), end: at(900) }),
  makeSpan({ name: "first", spanId: "f", parentId: "r", start: at(100), end: at(400) }),
  makeSpan({ name: "leaf", spanId: "l", parentId: "f", start: at(150), end: at(200) }),
  makeSpan({ name: "orphan", spanId: "o", parentId: "missing", start: at(50), end: at(60) }),
];

describe("span forest", () => {
  it("places spans without a resolvable parent at depth 0", () => {
    const forest = buildSpanForest(sampleSpans);
    const roots = forest.roots.map((index) => forest.nodes[index]);
    expect(roots.map((node) => node?.span.name)).toEqual(["root", "orphan"]);
    expect(roots.every((node) => node?.depth === 0 && node.parent === null)).toBe(true);
  });

  it("attaches children to their parent one level deeper, ordered by start time", () => {
    const forest = buildSpanForest(sampleSpans);
    const root = forest.nodes[0];
    expect(root?.children.map((index) => forest.nodes[index]?.span.name)).toEqual(["first", "second"]);

    for (const node of forest.nodes) {
      if (node.parent === null) continue;
      const parent = forest.nodes[node.parent];
      expect(parent?.children).toContain(node.index);
      expect(node.depth).toBe((parent?.depth ?? -1) + 1);
    }
  });

  it("computes durations and zeroes them for unparseable bounds", () => {
    const forest = buildSpanForest([
      ...sampleSpans,
      makeSpan({ name: "bad", spanId: "b", start: "not-a-time", end: at(10) }),
    ]);
    expect(forest.nodes[0]?.durationMs).toBe(1000);
    expect(forest.nodes[3]?.durationMs).toBe(50);
    expect(forest.nodes[5]?.durationMs).toBe(0);
  });

  it("sorts unparseable start times first and keeps ties in input order", () => {
    const forest = buildSpanForest([
      makeSpan({ name: "p", spanId: "p", start: at(0) }),
      makeSpan({ name: "late", spanId: "c1", parentId: "p", start: at(300) }),
      makeSpan({ name: "tie-a", spanId: "c2", parentId: "p", start: at(100) }),
      makeSpan({ name: "unknown-a", spanId: "c3", parentId: "p", start: "" }),
      makeSpan({ name: "tie-b", spanId: "c4", parentId: "p", start: at(100) }),
      makeSpan({ name: "unknown-b", spanId: "c5", parentId: "p", start: "garbage" }),
    ]);
    expect(forest.nodes[0]?.children.map((index) => forest.nodes[index]?.span.name)).toEqual([
      "unknown-a",
      "unknown-b",
      "tie-a",
      "tie-b",
      "late",
    ]);
  });

  it("flattens a fully expanded forest to one entry per span in pre-order", () => {
    const forest = buildSpanForest(sampleSpans);
    const flat = flattenForest(forest);
    expect(flat).toHaveLength(sampleSpans.length);
    expect(names(flat)).toEqual(["root", "first", "leaf", "second", "orphan"]);
  });

  it("removes exactly the subtree when collapsing and restores it on expand", () => {
    const forest = buildSpanForest(sampleSpans);
    const before = names(flattenForest(forest));

    toggleExpanded(forest, 2);
    expect(names(flattenForest(forest))).toEqual(["root", "first", "second", "orphan"]);

    toggleExpanded(forest, 0);
    expect(names(flattenForest(forest))).toEqual(["root", "orphan"]);
    expect(allNodesPreorder(forest)).toHaveLength(5);

    toggleExpanded(forest, 0);
    toggleExpanded(forest, 2);
    expect(names(flattenForest(forest))).toEqual(before);
  });

  it("expands every ancestor of a node", () => {
    const forest = buildSpanForest(sampleSpans);
    toggleExpanded(forest, 0);
    toggleExpanded(forest, 2);

    expect(names(ancestorsOf(forest, 3))).toEqual(["first", "root"]);
    expandAncestors(forest, 3);
    expect(names(flattenForest(forest))).toContain("leaf");
  });

  it("resolves duplicate span ids to the first occurrence and keeps every span", () => {
    const forest = buildSpanForest([
      makeSpan({ name: "first-dup", spanId: "d", start: at(0) }),
      makeSpan({ name: "second-dup", spanId: "d", start: at(10) }),
      makeSpan({ name: "child", spanId: "c", parentId: "d", start: at(20) }),
      makeSpan({ name: "no-id", spanId: "", start: at(30) }),
    ]);
    expect(forest.nodes.map((node) => node.key)).toEqual(["d", "d#1", "c", "#3"]);
    expect(forest.nodes[2]?.parent).toBe(0);
    expect(flattenForest(forest)).toHaveLength(4);
    expect(collectSpans(forest).map((span) => span.name)).toEqual(["first-dup", "second-dup", "child", "no-id"]);
  });

  it("breaks parent cycles into roots instead of looping", () => {
    const forest = buildSpanForest([
      makeSpan({ name: "a", spanId: "a", parentId: "b" }),
      makeSpan({ name: "b", spanId: "b", parentId: "a" }),
      makeSpan({ name: "self", spanId: "s", parentId: "s" }),
    ]);
    expect(flattenForest(forest)).toHaveLength(3);
    expect(forest.nodes[2]?.depth).toBe(0);
    expect(forest.nodes[0]?.depth).toBe(0);
    expect(forest.nodes[1]?.depth).toBe(1);
  });

  it("builds an empty forest from no spans", () => {
    expect(buildSpanForest([])).toEqual({ nodes: [], roots: [] });
  });
});
