import type { AppConfig, EventType, Span, TraceEvent, TraceObject } from "@spanscope/contracts";
import { EVENT_TYPES } from "@spanscope/contracts";
import { DEFAULT_CONFIG } from "./config.js";
import { estimateCost, totalTokens } from "./metrics.js";
import { spanDurationMs } from "./parsers/spans.js";
import { parseRfc3339 } from "./utils.js";

export interface CollectOptions {
  runId: string;
  command?: string;
  config?: AppConfig;
}

/** Substring rules in priority order; the first hit wins. */
const CLASSIFICATION_RULES: Array<[string, EventType]> = [
  ["tool", "tool_call"],
  ["llm", "llm_call"],
  ["agent", "thought"],
  ["workflow", "decision"],
];

export function classifySpan(name: string): EventType {
  const lower = name.toLowerCase();
  for (const [needle, type] of CLASSIFICATION_RULES) {
    if (lower.includes(needle)) return type;
  }
  return "thought";
}

function contentFor(key: string, type: EventType): boolean {
  switch (key) {
    case "agk.prompt.user":
    case "agk.llm.response":
      return true;
    case "agk.tool.arguments":
      return type === "tool_call";
    case "agk.tool.result":
      return type === "observation";
    default:
      return false;
  }
}

export function spanToEvent(span: Span): TraceEvent {
  const timestampMs = parseRfc3339(span.startTime);
  const type = classifySpan(span.name);
  const event: TraceEvent = {
    timestamp: timestampMs === null ? null : new Date(timestampMs).toISOString(),
    timestampMs,
    type,
    spanId: span.spanId,
    spanName: span.name,
    metadata: {},
    durationMs: spanDurationMs(span),
    parentId: span.parentSpanId,
  };

  for (const attribute of span.attributes) {
    event.metadata[attribute.key] = attribute.value;
    if (contentFor(attribute.key, type)) {
      event.content = String(attribute.value);
    }
  }

  return event;
}

function emptyTypeCounts(): Record<EventType, number> {
  return {
    thought: 0,
    tool_call: 0,
    observation: 0,
    llm_call: 0,
    decision: 0,
  };
}

function compareTimestamps(a: TraceEvent, b: TraceEvent): number {
  const left = a.timestampMs ?? Number.NEGATIVE_INFINITY;
  const right = b.timestampMs ?? Number.NEGATIVE_INFINITY;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Classifies every span and assembles the time-ordered event list with its summary.
 * The summary duration spans the earliest to the latest event timestamp.
 */
export function collectTraceObject(spans: Span[], options: CollectOptions): TraceObject {
  const config = options.config ?? DEFAULT_CONFIG;
  const typeCounts = emptyTypeCounts();
  const events: TraceEvent[] = [];
  let earliest: number | null = null;
  let latest: number | null = null;
  let hasDetailedData = false;

  for (const span of spans) {
    const event = spanToEvent(span);
    events.push(event);
    typeCounts[event.type] += 1;
    if (event.content) {
      hasDetailedData = true;
    }
    if (event.timestampMs !== null) {
      if (earliest === null || event.timestampMs < earliest) earliest = event.timestampMs;
      if (latest === null || event.timestampMs > latest) latest = event.timestampMs;
    }
  }

  events.sort(compareTimestamps);

  const tokensUsed = totalTokens(spans);
  const finalOutput = [...events].reverse().find((event) => event.type === "llm_call" && event.content)?.content;

  const traceObject: TraceObject = {
    runId: options.runId,
    startTime: earliest === null ? null : new Date(earliest).toISOString(),
    endTime: latest === null ? null : new Date(latest).toISOString(),
    events,
    summary: {
      totalEvents: events.length,
      typeCounts,
      thoughtCount: typeCounts.thought,
      toolCallCount: typeCounts.tool_call,
      llmCallCount: typeCounts.llm_call,
      totalDurationMs: earliest === null || latest === null ? 0 : Math.trunc(latest - earliest),
      tokensUsed,
      estimatedCost: estimateCost(tokensUsed, config.cost),
      hasDetailedData,
    },
  };
  if (options.command !== undefined) {
    traceObject.command = options.command;
  }
  if (finalOutput !== undefined) {
    traceObject.finalOutput = finalOutput;
  }
  return traceObject;
}

export function reasoningPath(traceObject: TraceObject): EventType[] {
  return traceObject.events.map((event) => event.type);
}

/** Event counts in the fixed category order, skipping empty categories. */
export function typeBreakdown(traceObject: TraceObject): Array<[EventType, number]> {
  return EVENT_TYPES.map((type): [EventType, number] => [type, traceObject.summary.typeCounts[type]]).filter(
    ([, count]) => count > 0,
  );
}
