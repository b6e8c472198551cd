import type { CostConfig, Span, SpanForest, SpanNode, TraceMetrics } from "@spanscope/contracts";
import { allNodesPreorder } from "./tree.js";

export const TOKEN_ATTRIBUTE_KEYS = ["agk.stream.tokens", "llm.usage.total_tokens"] as const;

const NON_ERROR_STATUS_CODES = new Set(["", "Unset", "Ok"]);

const TOP_N = 3;

export function isErrorSpan(span: Span): boolean {
  return !NON_ERROR_STATUS_CODES.has(span.status.code);
}

export function tokensFromSpan(span: Span): number {
  let total = 0;
  for (const key of TOKEN_ATTRIBUTE_KEYS) {
    const value = span.attrs[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      total += Math.trunc(value);
    }
  }
  return total;
}

export function totalTokens(spans: Span[]): number {
  let total = 0;
  for (const span of spans) {
    total += tokensFromSpan(span);
  }
  return total;
}

export function estimateCost(tokens: number, cost: CostConfig): number {
  return tokens * cost.perTokenUsd;
}

/** Parents inflated by their children are skipped unless they are LLM spans. */
export function isBottleneckCandidate(node: SpanNode): boolean {
  return node.children.length === 0 || node.span.name.toLowerCase().includes("llm");
}

function insertRanked(ranked: SpanNode[], node: SpanNode): void {
  let position = ranked.findIndex((entry) => node.durationMs > entry.durationMs);
  if (position < 0) position = ranked.length;
  if (position >= TOP_N) return;
  ranked.splice(position, 0, node);
  if (ranked.length > TOP_N) ranked.length = TOP_N;
}

/** Walks every node regardless of expand/collapse state. */
export function computeTraceMetrics(forest: SpanForest): TraceMetrics {
  const metrics: TraceMetrics = {
    totalTokens: 0,
    errorCount: 0,
    slowest: null,
    top3: [],
  };

  for (const node of allNodesPreorder(forest)) {
    metrics.totalTokens += tokensFromSpan(node.span);
    if (isErrorSpan(node.span)) {
      metrics.errorCount += 1;
    }
    if (!isBottleneckCandidate(node)) continue;
    if (!metrics.slowest || node.durationMs > metrics.slowest.durationMs) {
      metrics.slowest = node;
    }
    insertRanked(metrics.top3, node);
  }

  return metrics;
}
