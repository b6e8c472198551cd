import type {
  AttributeValue,
  DetailTab,
  FocusArea,
  RunManifest,
  SpanForest,
  SpanNode,
  TraceMetrics,
  ViewMode,
} from "@spanscope/contracts";
import { DETAIL_TABS, DETAIL_TAB_LABELS } from "@spanscope/contracts";
import { isErrorSpan } from "./metrics.js";
import { friendlyName, getAttribute, isInternalSpan, isWorkflowStep, spanKind } from "./parsers/spans.js";
import { truncateText } from "./utils.js";

export type Tone = "default" | "header" | "muted" | "error" | "success" | "warning" | "duration" | "key";

export interface ViewLine {
  text: string;
  tone: Tone;
}

export interface TreeLine {
  key: string;
  text: string;
  selected: boolean;
  error: boolean;
  match: boolean;
  internal: boolean;
  kind: ReturnType<typeof spanKind>;
}

export interface RunRow {
  runId: string;
  text: string;
  ok: boolean;
  selected: boolean;
}

const CONTENT_KEYS: Array<{ key: string; icon: string; label: string }> = [
  { key: "agk.prompt.user", icon: "📝", label: "User Prompt" },
  { key: "agk.prompt.system", icon: "🖥️", label: "System Prompt" },
  { key: "agk.llm.response", icon: "🤖", label: "LLM Response" },
  { key: "agk.tool.arguments", icon: "📥", label: "Tool Arguments" },
  { key: "agk.tool.result", icon: "📤", label: "Tool Result" },
];

const ATTRIBUTE_GROUPS: Array<{ title: string; matches: (key: string) => boolean }> = [
  { title: "LLM Configuration", matches: (key) => key.startsWith("agk.llm.") || key.startsWith("llm.") },
  { title: "Workflow Context", matches: (key) => key.startsWith("agk.workflow.") || key.startsWith("workflow.") },
  { title: "HTTP Details", matches: (key) => key.startsWith("http.") },
  { title: "Metadata", matches: () => true },
];

function line(text: string, tone: Tone = "default"): ViewLine {
  return { text, tone };
}

function label(name: string, width: number): string {
  return `${name}:`.padEnd(width);
}

export function isSuccessfulStatus(status: string): boolean {
  return status === "completed" || status === "ok";
}

export function statusLabel(node: SpanNode): string {
  return isErrorSpan(node.span) ? node.span.status.code : "OK";
}

export function shortenAttributeKey(key: string): string {
  let out = key;
  for (const prefix of ["agk.", "llm.", "workflow."]) {
    if (out.startsWith(prefix)) out = out.slice(prefix.length);
  }
  return out;
}

function sortedAttributes(node: SpanNode): Array<[string, AttributeValue]> {
  return Object.entries(node.span.attrs).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

export function formatCost(cost: number, digits = 4): string {
  return `$${cost.toFixed(digits)}`;
}

export function formatRunRow(manifest: RunManifest): string {
  const status = isSuccessfulStatus(manifest.status) ? "[OK]" : "[FAIL]";
  return [
    manifest.runId.padEnd(28),
    manifest.command.padEnd(12),
    formatSeconds(manifest.durationSeconds).padStart(7),
    `${manifest.llmCalls} LLM`,
    status,
  ].join("  ");
}

export function runListCapacity(height: number): number {
  return Math.max(5, height - 8);
}

/** The window of run rows that keeps the cursor on screen. */
export function runListRows(manifests: RunManifest[], cursor: number, height: number): RunRow[] {
  const capacity = runListCapacity(height);
  const offset = cursor >= capacity ? cursor - capacity + 1 : 0;
  return manifests.slice(offset, offset + capacity).map((manifest, i) => ({
    runId: manifest.runId,
    text: formatRunRow(manifest),
    ok: isSuccessfulStatus(manifest.status),
    selected: offset + i === cursor,
  }));
}

export function treeLine(node: SpanNode, selected: boolean, match: boolean): TreeLine {
  const indent = "  ".repeat(node.depth);
  const marker = node.children.length > 0 ? (node.expanded ? "▼ " : "▶ ") : "  ";
  const model = getAttribute(node.span, "agk.llm.model");
  const context = isWorkflowStep(node.span) && model !== undefined ? ` [${String(model)}]` : "";
  const error = isErrorSpan(node.span);
  const text = `${indent}${marker}${friendlyName(node.span)}${context}${error ? " [ERR]" : ""}${match ? " 🔍" : ""} (${node.durationMs}ms)`;
  return {
    key: node.key,
    text,
    selected,
    error,
    match,
    internal: isInternalSpan(node.span),
    kind: spanKind(node.span),
  };
}

/** Tree rows that fit in `rows` lines with the cursor kept on screen. */
export function treeWindow(visible: SpanNode[], cursor: number, rows: number, matches: ReadonlySet<string>): TreeLine[] {
  const capacity = Math.max(1, rows);
  const offset = cursor >= capacity ? cursor - capacity + 1 : 0;
  return visible
    .slice(offset, offset + capacity)
    .map((node, i) => treeLine(node, offset + i === cursor, matches.has(node.key)));
}

export function tabBar(selected: DetailTab): Array<{ tab: DetailTab; label: string; active: boolean }> {
  return DETAIL_TABS.map((tab) => ({ tab, label: DETAIL_TAB_LABELS[tab], active: tab === selected }));
}

function overviewLines(node: SpanNode): ViewLine[] {
  const out = [
    line("Overview", "header"),
    line(""),
    line(`${label("Name", 12)} ${friendlyName(node.span)}`),
    line(`${label("Type", 12)} ${spanKind(node.span)}`),
    line(`${label("Duration", 12)} ${node.durationMs}ms`),
    line(`${label("Status", 12)} ${statusLabel(node)}`, isErrorSpan(node.span) ? "error" : "success"),
  ];
  if (node.span.status.description) {
    out.push(line(`${label("Message", 12)} ${node.span.status.description}`));
  }

  const tokens = getAttribute(node.span, "llm.usage.total_tokens");
  if (tokens !== undefined) {
    out.push(line(""), line("Resource Usage", "header"), line(`${label("Tokens", 12)} ${String(tokens)}`));
    const prompt = getAttribute(node.span, "llm.usage.prompt_tokens");
    if (prompt !== undefined) out.push(line(`${label("  Prompt", 12)} ${String(prompt)}`));
    const completion = getAttribute(node.span, "llm.usage.completion_tokens");
    if (completion !== undefined) out.push(line(`${label("  Response", 12)} ${String(completion)}`));
  }

  const model = getAttribute(node.span, "llm.model");
  if (model !== undefined) out.push(line(`${label("Model", 12)} ${String(model)}`));
  return out;
}

function sectionLines(node: SpanNode, sections: Array<[string, string]>, emptyText: string): ViewLine[] {
  const out: ViewLine[] = [];
  for (const [key, title] of sections) {
    const value = getAttribute(node.span, key);
    if (value === undefined) continue;
    out.push(line(title, "header"), line(""));
    for (const text of String(value).split("\n")) out.push(line(text));
    out.push(line(""));
  }
  return out.length > 0 ? out : [line(emptyText, "muted")];
}

function attributesLines(node: SpanNode): ViewLine[] {
  const out = [line("All Attributes", "header"), line("")];
  const attributes = sortedAttributes(node);
  if (attributes.length === 0) {
    out.push(line("No attributes available", "muted"));
    return out;
  }
  for (const [key, value] of attributes) {
    out.push(line(`${`${shortenAttributeKey(key)}:`.padEnd(30)} ${String(value)}`));
  }
  return out;
}

function timingLines(node: SpanNode, forest: SpanForest): ViewLine[] {
  const out = [
    line("Timing Details", "header"),
    line(""),
    line(`${label("Duration", 15)} ${node.durationMs}ms`),
    line(`${label("Start Time", 15)} ${node.span.startTime}`),
    line(`${label("End Time", 15)} ${node.span.endTime}`),
  ];

  const children = node.children.map((index) => forest.nodes[index]).filter((child): child is SpanNode => !!child);
  if (children.length > 0) {
    out.push(line(""), line("Child Spans", "header"), line(""));
    let totalChildTime = 0;
    for (const child of children) {
      totalChildTime += child.durationMs;
      const percentage = node.durationMs > 0 ? (child.durationMs / node.durationMs) * 100 : 0;
      const bar = "█".repeat(Math.max(0, Math.min(50, Math.trunc(percentage / 2))));
      out.push(
        line(
          `${friendlyName(child.span).padEnd(30)} ${`${child.durationMs}`.padStart(5)}ms ${percentage.toFixed(1).padStart(6)}% ${bar}`,
          "duration",
        ),
      );
    }
    out.push(line(""), line(`${"Total Child Time:".padEnd(30)} ${`${totalChildTime}`.padStart(5)}ms`));
    const selfTime = node.durationMs - totalChildTime;
    if (selfTime > 0) {
      out.push(line(`${"Self Time:".padEnd(30)} ${`${selfTime}`.padStart(5)}ms`));
    }
  }

  const ttft = getAttribute(node.span, "llm.time_to_first_token");
  if (ttft !== undefined) {
    out.push(line(""), line("Performance Metrics", "header"), line(""));
    out.push(line(`${"Time to First Token:".padEnd(25)} ${String(ttft)}`));
  }
  return out;
}

export function tabLines(node: SpanNode | undefined, tab: DetailTab, forest: SpanForest): ViewLine[] {
  if (!node) return [line("No span selected", "muted")];
  switch (tab) {
    case "overview":
      return overviewLines(node);
    case "prompt":
      return sectionLines(
        node,
        [
          ["agk.prompt.system", "System Prompt"],
          ["agk.prompt.user", "User Prompt"],
          ["llm.request.messages", "Messages"],
        ],
        "No prompt data available for this span",
      );
    case "response":
      return sectionLines(
        node,
        [
          ["agk.llm.response", "Response Text"],
          ["agk.tool.result", "Tool Result"],
          ["llm.response.finish_reason", "Finish Reason"],
        ],
        "No response data available for this span",
      );
    case "attributes":
      return attributesLines(node);
    case "timing":
      return timingLines(node, forest);
  }
}

/** Prompt, response and tool payloads, each cut to `maxChars`. */
export function contentLines(node: SpanNode, maxChars: number): ViewLine[] {
  const present = CONTENT_KEYS.filter((entry) => getAttribute(node.span, entry.key) !== undefined);
  if (present.length === 0) return [];

  const out = [line(""), line("Content (Detailed Trace)", "header")];
  for (const entry of present) {
    const content = String(getAttribute(node.span, entry.key));
    out.push(line(""), line(`${entry.icon} ${entry.label}`, "key"), line("─".repeat(40), "muted"));
    const shown = truncateText(content, maxChars);
    for (const text of shown.split("\n")) out.push(line(text));
    if (shown !== content) out.push(line("[truncated]", "muted"));
  }
  return out;
}

export function attributeGroupLines(node: SpanNode): ViewLine[] {
  const attributes = sortedAttributes(node);
  if (attributes.length === 0) {
    return [line("Attributes", "header"), line("  No attributes available", "muted")];
  }

  const grouped = new Map<string, Array<[string, AttributeValue]>>();
  for (const entry of attributes) {
    const group = ATTRIBUTE_GROUPS.find((candidate) => candidate.matches(entry[0]));
    if (!group) continue;
    const bucket = grouped.get(group.title) ?? [];
    bucket.push(entry);
    grouped.set(group.title, bucket);
  }

  const out: ViewLine[] = [];
  for (const group of ATTRIBUTE_GROUPS) {
    const bucket = grouped.get(group.title);
    if (!bucket) continue;
    out.push(line(group.title, "header"));
    for (const [key, value] of bucket) {
      const lastSegment = key.split(".").pop() ?? key;
      out.push(line(`  ${lastSegment.padEnd(20)}${String(value)}`));
    }
  }
  return out;
}

function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id || "-";
}

/** Side panel: identity, status and timing first, then resources, errors and attributes. */
export function metadataLines(node: SpanNode | undefined, forest: SpanForest, perTokenUsd: number): ViewLine[] {
  if (!node) return [line("No span selected", "muted")];
  const parent = node.parent === null ? undefined : forest.nodes[node.parent];
  const out = [
    line("Identity", "header"),
    line(`${label("Type", 12)} ${spanKind(node.span)}`),
    line(`${label("Span ID", 12)} ${shortId(node.span.spanId)}`),
  ];
  if (parent) out.push(line(`${label("Parent", 12)} ${shortId(parent.span.spanId)}`));
  out.push(
    line(""),
    line("Status", "header"),
    line(`${label("Status", 12)} ${statusLabel(node)}`, isErrorSpan(node.span) ? "error" : "success"),
    line(""),
    line("Timing", "header"),
    line(`${label("Duration", 12)} ${node.durationMs}ms`),
    line(`${label("Start", 12)} ${node.span.startTime}`),
    line(""),
  );

  const tokens = getAttribute(node.span, "llm.usage.total_tokens");
  if (typeof tokens === "number") {
    out.push(line("Resources", "header"), line(`${label("Tokens", 12)} ${tokens}`));
    const cost = tokens * perTokenUsd;
    if (cost > 0) out.push(line(`${label("Est. Cost", 12)} ${formatCost(cost, 6)}`, "warning"));
    out.push(line(""));
  }

  if (isErrorSpan(node.span)) {
    out.push(line("Error", "header"), line(node.span.status.description || node.span.status.code, "error"), line(""));
  }

  out.push(...attributeGroupLines(node));
  return out;
}

/** The full-screen detail view: the selected tab, with payload previews on the overview. */
export function detailLines(node: SpanNode | undefined, tab: DetailTab, forest: SpanForest, previewChars: number): ViewLine[] {
  const lines = tabLines(node, tab, forest);
  if (node && tab === "overview") {
    lines.push(...contentLines(node, previewChars));
  }
  return lines;
}

export interface RunSummaryInput {
  manifest: RunManifest | undefined;
  metrics: TraceMetrics;
  estimatedCost: number;
}

export function runSummaryLines({ manifest, metrics, estimatedCost }: RunSummaryInput): ViewLine[] {
  if (!manifest) return [line("No run loaded", "muted")];
  const parts = [
    `Duration: ${formatSeconds(manifest.durationSeconds)}`,
    `Spans: ${manifest.spanCount}`,
    `LLM: ${manifest.llmCalls}`,
  ];
  if (metrics.totalTokens > 0) {
    parts.push(`Tokens: ${metrics.totalTokens}`, `Cost: ${formatCost(estimatedCost)}`);
  }
  parts.push(`Status: ${isSuccessfulStatus(manifest.status) ? "[OK]" : "[FAIL]"}`);
  if (metrics.errorCount > 0) parts.push(`Errors: ${metrics.errorCount}`);

  const out = [line(`Run: ${manifest.runId}`, "header"), line(parts.join("  |  "), "muted")];
  const slowest = metrics.slowest;
  if (slowest && slowest.durationMs > 100) {
    const stepName = getAttribute(slowest.span, "agk.workflow.step_name");
    const model = getAttribute(slowest.span, "agk.llm.model");
    const name =
      stepName !== undefined
        ? String(stepName)
        : model !== undefined
          ? `${slowest.span.name} [${String(model)}]`
          : slowest.span.name;
    out.push(line(`Bottleneck: ${name} (${slowest.durationMs}ms)`, "duration"));
  }
  if (metrics.top3.length > 1) {
    out.push(
      line(`Slowest: ${metrics.top3.map((node) => `${friendlyName(node.span)} ${node.durationMs}ms`).join(", ")}`, "muted"),
    );
  }
  return out;
}

const KEY_HINTS: Record<ViewMode, string> = {
  run_list: "↑/↓ select  enter open  q quit",
  tree: "↑/↓ move  enter toggle  d detail  / search  n/N match  e/E error  tab focus  [/] run  esc back  q quit",
  detail: "←/→ tab  ↑/↓ scroll  esc back  q quit",
};

export interface StatusBarInput {
  view: ViewMode;
  focus: FocusArea;
  search: { active: boolean; input: string; query: string; matches: readonly string[]; index: number };
  live: boolean;
  lastUpdateMs: number | null;
}

export function statusBarText({ view, focus, search, live, lastUpdateMs }: StatusBarInput): string {
  if (search.active) return `/${search.input}`;
  const parts: string[] = [];
  if (view === "tree") parts.push(`focus: ${focus}`);
  if (view !== "run_list" && search.query) {
    parts.push(
      search.matches.length > 0
        ? `match ${search.index + 1}/${search.matches.length} "${search.query}"`
        : `no matches for "${search.query}"`,
    );
  }
  if (live) {
    parts.push(lastUpdateMs === null ? "LIVE" : `LIVE ${new Date(lastUpdateMs).toISOString().slice(11, 19)}`);
  }
  parts.push(KEY_HINTS[view]);
  return parts.join("  |  ");
}
