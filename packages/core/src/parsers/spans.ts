import type { AttributeValue, Span, SpanAttribute, SpanKind, SpanStatus } from "@spanscope/contracts";
import { asArray, asRecord, asString, durationBetween } from "../utils.js";
import { parseJsonLines } from "./common.js";

const NUMERIC_STATUS_CODES: Record<number, string> = {
  0: "Unset",
  1: "Error",
  2: "Ok",
};

function toAttributeValue(raw: unknown): AttributeValue | null {
  if (typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (raw === null || raw === undefined) return null;
  return asString(raw);
}

function parseAttributes(raw: unknown): SpanAttribute[] {
  const attributes: SpanAttribute[] = [];
  for (const entry of asArray(raw)) {
    const record = asRecord(entry);
    const key = record.Key;
    if (typeof key !== "string" || !key) continue;
    const valueRecord = asRecord(record.Value);
    if (!("Value" in valueRecord)) continue;
    const value = toAttributeValue(valueRecord.Value);
    if (value === null) continue;
    attributes.push({ key, value });
  }
  return attributes;
}

function parseStatus(raw: unknown): SpanStatus {
  const record = asRecord(raw);
  const code =
    typeof record.Code === "number" ? NUMERIC_STATUS_CODES[record.Code] ?? String(record.Code) : asString(record.Code);
  return {
    code,
    description: asString(record.Description),
  };
}

/** Last occurrence of a key wins. */
export function flattenAttributes(attributes: SpanAttribute[]): Record<string, AttributeValue> {
  const flat: Record<string, AttributeValue> = {};
  for (const attribute of attributes) {
    flat[attribute.key] = attribute.value;
  }
  return flat;
}

export function spanFromRecord(record: Record<string, unknown>): Span {
  const spanContext = asRecord(record.SpanContext);
  const parent = asRecord(record.Parent);
  const attributes = parseAttributes(record.Attributes);
  return {
    name: asString(record.Name),
    startTime: typeof record.StartTime === "string" ? record.StartTime : "",
    endTime: typeof record.EndTime === "string" ? record.EndTime : "",
    traceId: asString(spanContext.TraceID),
    spanId: asString(spanContext.SpanID),
    parentSpanId: asString(parent.SpanID),
    attributes,
    attrs: flattenAttributes(attributes),
    status: parseStatus(record.Status),
  };
}

export function parseSpanLine(line: string): Span | null {
  const record = parseJsonLines([line])[0];
  return record ? spanFromRecord(record) : null;
}

/**
 * Parses newline-delimited span records. Blank, malformed and non-object lines are
 * dropped so a partially corrupted log still yields every readable span.
 */
export function parseSpans(data: string | string[]): Span[] {
  return parseJsonLines(data).map(spanFromRecord);
}

const IMPORTANT_ATTRIBUTE_KEYS = [
  "agk.llm.provider",
  "agk.llm.model",
  "agk.llm.max_tokens",
  "agk.llm.temperature",
  "agk.stream.tokens",
  "agk.llm.latency_ms",
  "agk.workflow.step_name",
  "agk.workflow.step_index",
  "agk.workflow.mode",
  "agk.workflow.success",
  "agk.workflow.latency_ms",
  "agk.workflow.id",
  "agk.tools.count",
  "agk.tool.name",
  "http.status_code",
  "llm.streaming",
  "error.message",
  "error.type",
];

const WORKFLOW_MODE_LABELS: Array<[string, string]> = [
  ["agk.workflow.sequential", "📋 Sequential Workflow"],
  ["agk.workflow.parallel", "⚡ Parallel Workflow"],
  ["agk.workflow.dag", "🔀 DAG Workflow"],
  ["agk.workflow.loop", "🔄 Loop Workflow"],
];

export function getAttribute(span: Span, key: string): AttributeValue | undefined {
  return Object.prototype.hasOwnProperty.call(span.attrs, key) ? span.attrs[key] : undefined;
}

export function importantAttributes(span: Span): Array<[string, AttributeValue]> {
  const out: Array<[string, AttributeValue]> = [];
  for (const key of IMPORTANT_ATTRIBUTE_KEYS) {
    const value = getAttribute(span, key);
    if (value !== undefined) out.push([key, value]);
  }
  return out;
}

export function spanKind(span: Span): SpanKind {
  const name = span.name.toLowerCase();
  if (name.includes("workflow")) return "workflow";
  if (name.includes("agent")) return "agent";
  if (name.includes("llm")) return "llm";
  if (name.includes("tool") || name.includes("mcp")) return "tool";
  return "other";
}

export function friendlyName(span: Span): string {
  const name = span.name.toLowerCase();

  if (name.includes("workflow.step")) {
    const stepName = getAttribute(span, "agk.workflow.step_name");
    if (stepName !== undefined) return `🔹 ${String(stepName)}`;
  }

  for (const [needle, label] of WORKFLOW_MODE_LABELS) {
    if (name.includes(needle)) return label;
  }

  const model = getAttribute(span, "agk.llm.model");
  if (name.includes("llm") && model !== undefined) {
    const provider = getAttribute(span, "agk.llm.provider");
    return `🤖 ${provider === undefined ? "llm" : String(provider)} [${String(model)}]`;
  }

  if (name.includes("agk.agent.run")) {
    return model === undefined ? "🤖 Agent" : `🤖 Agent [${String(model)}]`;
  }

  return span.name;
}

export function isWorkflowStep(span: Span): boolean {
  return span.name.toLowerCase().includes("workflow.step");
}

/** Implementation-detail spans the tree renders dimmed. */
export function isInternalSpan(span: Span): boolean {
  const name = span.name.toLowerCase();
  return name.includes("agk.agent.run.stream") || name.includes("agk.agent.run.execute") || name.includes("transform");
}

export function spanDurationMs(span: Span): number {
  return durationBetween(span.startTime, span.endTime);
}
