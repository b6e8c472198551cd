export type AttributeValue = string | number | boolean;

export type EventType = "thought" | "tool_call" | "observation" | "llm_call" | "decision";
export type SpanKind = "workflow" | "agent" | "llm" | "tool" | "other";
export type ExportFormat = "json" | "jaeger" | "otel";

export type ViewMode = "run_list" | "tree" | "detail";
export type FocusArea = "tree" | "details" | "metadata";
export type DetailTab = "overview" | "prompt" | "response" | "attributes" | "timing";

export interface SpanAttribute {
  key: string;
  value: AttributeValue;
}

export interface SpanStatus {
  code: string;
  description: string;
}

export interface Span {
  name: string;
  startTime: string;
  endTime: string;
  traceId: string;
  spanId: string;
  parentSpanId: string;
  attributes: SpanAttribute[];
  attrs: Record<string, AttributeValue>;
  status: SpanStatus;
}

export interface SpanNode {
  index: number;
  key: string;
  span: Span;
  children: number[];
  parent: number | null;
  depth: number;
  expanded: boolean;
  durationMs: number;
}

export interface SpanForest {
  nodes: SpanNode[];
  roots: number[];
}

export interface TraceMetrics {
  totalTokens: number;
  errorCount: number;
  slowest: SpanNode | null;
  top3: SpanNode[];
}

export interface TraceEvent {
  timestamp: string | null;
  timestampMs: number | null;
  type: EventType;
  spanId: string;
  spanName: string;
  content?: string;
  metadata: Record<string, AttributeValue>;
  durationMs: number;
  parentId: string;
}

export interface TraceObjectSummary {
  totalEvents: number;
  typeCounts: Record<EventType, number>;
  thoughtCount: number;
  toolCallCount: number;
  llmCallCount: number;
  totalDurationMs: number;
  tokensUsed: number;
  estimatedCost: number;
  hasDetailedData: boolean;
}

export interface TraceObject {
  runId: string;
  command?: string;
  startTime: string | null;
  endTime: string | null;
  events: TraceEvent[];
  finalOutput?: string;
  summary: TraceObjectSummary;
}

export interface RunManifest {
  runId: string;
  command: string;
  status: string;
  startTime: string | null;
  endTime: string | null;
  durationSeconds: number;
  spanCount: number;
  llmCalls: number;
  totalTokens: number;
  estimatedCost: number;
  derived: boolean;
}

export interface RunData {
  manifest: RunManifest;
  spans: Span[];
  runPath: string;
  tracePath: string;
}

export interface RunsConfig {
  directory: string;
  traceFileName: string;
  manifestFileName: string;
}

export interface LiveConfig {
  pollIntervalMs: number;
}

export interface CostConfig {
  perTokenUsd: number;
}

export interface ExplorerConfig {
  contentPreviewChars: number;
}

export interface AppConfig {
  runs: RunsConfig;
  live: LiveConfig;
  cost: CostConfig;
  explorer: ExplorerConfig;
}

export const EVENT_TYPES: readonly EventType[] = ["thought", "tool_call", "observation", "llm_call", "decision"];
export const FOCUS_AREAS: readonly FocusArea[] = ["tree", "details", "metadata"];
export const DETAIL_TABS: readonly DetailTab[] = ["overview", "prompt", "response", "attributes", "timing"];

export const DETAIL_TAB_LABELS: Record<DetailTab, string> = {
  overview: "Overview",
  prompt: "Prompt",
  response: "Response",
  attributes: "Attributes",
  timing: "Timing",
};
