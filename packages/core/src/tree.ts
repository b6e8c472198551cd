import type { Span, SpanForest, SpanNode } from "@spanscope/contracts";
import { spanDurationMs } from "./parsers/spans.js";
import { isRootParentId, parseRfc3339 } from "./utils.js";

export interface FlattenOptions {
  includeCollapsed?: boolean;
}

/** Unparseable start times sort as the zero time. */
function startKey(node: SpanNode): number {
  return parseRfc3339(node.span.startTime) ?? Number.NEGATIVE_INFINITY;
}

function compareStart(a: SpanNode, b: SpanNode): number {
  const left = startKey(a);
  const right = startKey(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function sortByStart(forest: SpanForest, indices: number[]): number[] {
  const nodes = indices.map((index) => forest.nodes[index]).filter((node): node is SpanNode => node !== undefined);
  // Array.prototype.sort is stable, so ties keep input order.
  nodes.sort(compareStart);
  return nodes.map((node) => node.index);
}

/**
 * Builds the span forest. The first span carrying a given SpanID owns it for parent
 * resolution; later duplicates still get their own node. A parent reference that does
 * not resolve (or points at the span itself) makes the span a root.
 */
export function buildSpanForest(spans: Span[]): SpanForest {
  const nodes: SpanNode[] = [];
  const byId = new Map<string, number>();
  const usedKeys = new Set<string>();

  spans.forEach((span, index) => {
    let key = span.spanId;
    if (!key || usedKeys.has(key)) {
      key = `${span.spanId}#${index}`;
    }
    usedKeys.add(key);
    if (span.spanId && !byId.has(span.spanId)) {
      byId.set(span.spanId, index);
    }
    nodes.push({
      index,
      key,
      span,
      children: [],
      parent: null,
      depth: 0,
      expanded: true,
      durationMs: spanDurationMs(span),
    });
  });

  const forest: SpanForest = { nodes, roots: [] };
  const roots: number[] = [];

  for (const node of nodes) {
    const parentId = node.span.parentSpanId;
    const parentIndex = isRootParentId(parentId) ? undefined : byId.get(parentId);
    const parent = parentIndex === undefined ? undefined : nodes[parentIndex];
    if (!parent || parent.index === node.index) {
      roots.push(node.index);
      continue;
    }
    node.parent = parent.index;
    parent.children.push(node.index);
  }

  forest.roots = sortByStart(forest, roots);

  // Parent cycles never reach a root; whatever stays unvisited is promoted to a root.
  const visited = new Set<number>();
  const assignDepths = (rootIndices: number[]): void => {
    const stack: Array<{ index: number; depth: number }> = rootIndices
      .map((index) => ({ index, depth: 0 }))
      .reverse();
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const node = nodes[entry.index];
      if (!node || visited.has(node.index)) continue;
      visited.add(node.index);
      node.depth = entry.depth;
      node.children = sortByStart(forest, node.children);
      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        const child = node.children[i];
        if (child !== undefined) stack.push({ index: child, depth: entry.depth + 1 });
      }
    }
  };

  assignDepths(forest.roots);
  for (const node of nodes) {
    if (visited.has(node.index)) continue;
    const parent = node.parent === null ? undefined : nodes[node.parent];
    if (parent) {
      parent.children = parent.children.filter((child) => child !== node.index);
    }
    node.parent = null;
    forest.roots.push(node.index);
    assignDepths([node.index]);
  }

  return forest;
}

function flattenFrom(forest: SpanForest, indices: number[], includeCollapsed: boolean, out: SpanNode[]): void {
  for (const index of indices) {
    const node = forest.nodes[index];
    if (!node) continue;
    out.push(node);
    if (node.expanded || includeCollapsed) {
      flattenFrom(forest, node.children, includeCollapsed, out);
    }
  }
}

/** Pre-order listing; collapsed subtrees are skipped unless `includeCollapsed` is set. */
export function flattenForest(forest: SpanForest, options: FlattenOptions = {}): SpanNode[] {
  const out: SpanNode[] = [];
  flattenFrom(forest, forest.roots, options.includeCollapsed ?? false, out);
  return out;
}

export function allNodesPreorder(forest: SpanForest): SpanNode[] {
  return flattenForest(forest, { includeCollapsed: true });
}

/** Nearest parent first. */
export function ancestorsOf(forest: SpanForest, index: number): SpanNode[] {
  const out: SpanNode[] = [];
  let current = forest.nodes[index];
  while (current && current.parent !== null) {
    const parent = forest.nodes[current.parent];
    if (!parent) break;
    out.push(parent);
    current = parent;
  }
  return out;
}

export function expandAncestors(forest: SpanForest, index: number): void {
  for (const ancestor of ancestorsOf(forest, index)) {
    ancestor.expanded = true;
  }
}

export function toggleExpanded(forest: SpanForest, index: number): boolean {
  const node = forest.nodes[index];
  if (!node) return false;
  node.expanded = !node.expanded;
  return node.expanded;
}

export function collectSpans(forest: SpanForest): Span[] {
  return forest.nodes.map((node) => node.span);
}
