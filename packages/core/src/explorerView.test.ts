import { describe, expect, it } from "vitest";
import type { RunManifest } from "@spanscope/contracts";
import { makeSpan, sampleRunSpans } from "./__tests__/spanFactory.js";
import {
  contentLines,
  formatRunRow,
  metadataLines,
  runListRows,
  runSummaryLines,
  statusBarText,
  tabBar,
  tabLines,
  treeLine,
  treeWindow,
} from "./explorerView.js";
import { computeTraceMetrics } from "./metrics.js";
import { deriveManifest } from "./runs.js";
import { buildSpanForest, flattenForest } from "./tree.js";

function manifest(overrides: Partial<RunManifest> = {}): RunManifest {
  return {
    runId: "run-1",
    command: "chat",
    status: "completed",
    startTime: null,
    endTime: null,
    durationSeconds: 2.5,
    spanCount: 4,
    llmCalls: 3,
    totalTokens: 0,
    estimatedCost: 0,
    derived: false,
    ...overrides,
  };
}

function sampleForest() {
  return buildSpanForest(sampleRunSpans());
}

describe("run list rows", () => {
  it("formats id, command, duration, llm calls and status in columns", () => {
    expect(formatRunRow(manifest())).toBe(`${"run-1".padEnd(28)}  ${"chat".padEnd(12)}    2.50s  3 LLM  [OK]`);
    expect(formatRunRow(manifest({ status: "failed" })).endsWith("  3 LLM  [FAIL]")).toBe(true);
  });

  it("scrolls the window so the cursor stays visible", () => {
    const manifests = Array.from({ length: 10 }, (_, i) => manifest({ runId: `run-${i}` }));
    const rows = runListRows(manifests, 7, 12);
    expect(rows.map((row) => row.runId)).toEqual(["run-3", "run-4", "run-5", "run-6", "run-7"]);
    expect(rows.filter((row) => row.selected).map((row) => row.runId)).toEqual(["run-7"]);
  });
});

describe("tree lines", () => {
  it("indents by depth and marks expand state, errors and matches", () => {
    const forest = sampleForest();
    const [root, step, llm] = forest.nodes;
    expect(root && treeLine(root, true, false).text).toBe("▼ 🤖 Agent (1000ms)");
    expect(step && treeLine(step, false, true).text).toBe("  ▼ 🔹 plan 🔍 (500ms)");
    expect(llm && treeLine(llm, false, false)).toMatchObject({
      key: "l",
      text: "      🤖 llm [m-small] [ERR] (350ms)",
      error: true,
      kind: "llm",
    });

    if (step) step.expanded = false;
    expect(step && treeLine(step, false, false).text).toBe("  ▶ 🔹 plan (500ms)");
  });

  it("shows the model on workflow steps that carry one", () => {
    const [node] = buildSpanForest([
      makeSpan({
        name: "agk.workflow.step",
        spanId: "s",
        attrs: { "agk.workflow.step_name": "draft", "agk.llm.model": "m-large" },
      }),
    ]).nodes;
    expect(node && treeLine(node, false, false).text).toBe("  🔹 draft [m-large] (0ms)");
  });

  it("windows the visible rows around the cursor", () => {
    const forest = sampleForest();
    const window = treeWindow(flattenForest(forest), 3, 2, new Set(["t"]));
    expect(window.map((entry) => [entry.key, entry.selected, entry.match])).toEqual([
      ["l", false, false],
      ["t", true, true],
    ]);
  });
});

describe("detail panels", () => {
  it("marks the active tab", () => {
    expect(tabBar("response").filter((entry) => entry.active).map((entry) => entry.label)).toEqual(["Response"]);
  });

  it("renders the overview tab", () => {
    const forest = sampleForest();
    expect(tabLines(forest.nodes[2], "overview", forest).map((entry) => entry.text)).toEqual([
      "Overview",
      "",
      "Name:        🤖 llm [m-small]",
      "Type:        llm",
      "Duration:    350ms",
      "Status:      Error",
      "Message:     rate limited",
    ]);
  });

  it("breaks down child time on the timing tab", () => {
    const forest = sampleForest();
    const lines = tabLines(forest.nodes[0], "timing", forest).map((entry) => entry.text);
    expect(lines).toContain(`${"Total Child Time:".padEnd(30)}   700ms`);
    expect(lines).toContain(`${"Self Time:".padEnd(30)}   300ms`);
  });

  it("falls back to a placeholder when nothing is selected or a tab is empty", () => {
    const forest = sampleForest();
    expect(tabLines(undefined, "overview", forest)).toEqual([{ text: "No span selected", tone: "muted" }]);
    expect(tabLines(forest.nodes[0], "prompt", forest)).toEqual([
      { text: "No prompt data available for this span", tone: "muted" },
    ]);
  });

  it("cuts long payloads to the preview length", () => {
    const [node] = buildSpanForest([
      makeSpan({ name: "agk.llm.generate", spanId: "p", attrs: { "agk.prompt.user": "abcdefghij" } }),
    ]).nodes;
    const lines = node ? contentLines(node, 8).map((entry) => entry.text) : [];
    expect(lines.slice(-2)).toEqual(["abcde...", "[truncated]"]);
    expect(lines).toContain("📝 User Prompt");
  });

  it("lists identity, status and grouped attributes in the metadata panel", () => {
    const forest = sampleForest();
    const lines = metadataLines(forest.nodes[2], forest, 0.00001).map((entry) => entry.text);
    expect(lines.slice(0, 4)).toEqual(["Identity", "Type:        llm", "Span ID:     l", "Parent:      s"]);
    expect(lines).toContain("rate limited");
    expect(lines.slice(-2)).toEqual(["LLM Configuration", `  ${"model".padEnd(20)}m-small`]);
  });
});

describe("run summary", () => {
  it("summarises the run and names the bottleneck", () => {
    const spans = sampleRunSpans();
    const metrics = computeTraceMetrics(buildSpanForest(spans));
    const lines = runSummaryLines({
      manifest: deriveManifest("run-20260101-chat", spans),
      metrics,
      estimatedCost: 0,
    }).map((entry) => entry.text);
    expect(lines).toEqual([
      "Run: run-20260101-chat",
      "Duration: 1.00s  |  Spans: 4  |  LLM: 1  |  Status: [OK]  |  Errors: 1",
      "Bottleneck: agk.llm.generate [m-small] (350ms)",
      "Slowest: 🤖 llm [m-small] 350ms, agk.tool.search 200ms",
    ]);
  });

  it("shows token usage and cost when tokens were recorded", () => {
    const spans = [makeSpan({ name: "agk.llm.generate", spanId: "a", attrs: { "agk.stream.tokens": 1500 } })];
    const lines = runSummaryLines({
      manifest: manifest({ spanCount: 1, llmCalls: 1 }),
      metrics: computeTraceMetrics(buildSpanForest(spans)),
      estimatedCost: 0.015,
    }).map((entry) => entry.text);
    expect(lines[1]).toBe("Duration: 2.50s  |  Spans: 1  |  LLM: 1  |  Tokens: 1500  |  Cost: $0.0150  |  Status: [OK]");
  });
});

describe("status bar", () => {
  const idleSearch = { active: false, input: "", query: "", matches: [], index: -1 };

  it("shows the search input while typing", () => {
    expect(
      statusBarText({
        view: "tree",
        focus: "tree",
        search: { ...idleSearch, active: true, input: "llm" },
        live: false,
        lastUpdateMs: null,
      }),
    ).toBe("/llm");
  });

  it("reports focus, match position and the live clock", () => {
    const text = statusBarText({
      view: "tree",
      focus: "details",
      search: { active: false, input: "", query: "tool", matches: ["a", "b"], index: 1 },
      live: true,
      lastUpdateMs: Date.UTC(2026, 0, 1, 9, 30, 5),
    });
    expect(text.split("  |  ").slice(0, 3)).toEqual(["focus: details", 'match 2/2 "tool"', "LIVE 09:30:05"]);
  });

  it("says when a committed query matched nothing", () => {
    const text = statusBarText({
      view: "detail",
      focus: "tree",
      search: { ...idleSearch, query: "zzz" },
      live: false,
      lastUpdateMs: null,
    });
    expect(text).toBe('no matches for "zzz"  |  ←/→ tab  ↑/↓ scroll  esc back  q quit');
  });
});
