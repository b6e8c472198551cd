import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { render } from "ink-testing-library";
import { describe, expect, it } from "vitest";
import type { RunData } from "@spanscope/contracts";
import { deriveManifest, LiveTailMonitor, parseSpans, TraceExplorer } from "@spanscope/core";
import { App } from "./App.js";

function delay(ms = 80): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function spanLine(name: string, spanId: string, parentId: string, attrs: Record<string, string> = {}): string {
  return JSON.stringify({
    Name: name,
    StartTime: "2026-01-01T00:00:00.000Z",
    EndTime: "2026-01-01T00:00:00.250Z",
    SpanContext: { TraceID: "trace-1", SpanID: spanId },
    Parent: { TraceID: "trace-1", SpanID: parentId },
    Attributes: Object.entries(attrs).map(([Key, Value]) => ({ Key, Value: { Type: "STRING", Value } })),
    Status: { Code: "Unset", Description: "" },
  });
}

const traceText = [
  spanLine("agk.agent.run", "r", ""),
  spanLine("agk.workflow.step", "s", "r", { "agk.workflow.step_name": "plan" }),
].join("\n");

function makeRun(runId: string): RunData {
  const spans = parseSpans(traceText);
  return { manifest: deriveManifest(runId, spans), spans, runPath: `/runs/${runId}`, tracePath: `/runs/${runId}/trace.jsonl` };
}

describe("explorer app", () => {
  it("lists runs and opens the selected one", async () => {
    const explorer = new TraceExplorer([makeRun("run-20260102-chat"), makeRun("run-20260101-review")]);
    const { lastFrame, stdin, unmount } = render(<App explorer={explorer} />);
    await delay();
    expect(lastFrame()).toContain("run-20260102-chat");
    expect(lastFrame()).toContain("run-20260101-review");

    stdin.write("j");
    await delay();
    expect(explorer.state.runCursor).toBe(1);

    stdin.write("\r");
    await delay();
    expect(explorer.state.view).toBe("tree");
    expect(lastFrame()).toContain("🔹 plan");
    expect(lastFrame()).toContain("Run: run-20260101-review");
    unmount();
  });

  it("feeds live tail updates into the tree", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "spanscope-app-"));
    const tracePath = path.join(root, "trace.jsonl");
    await writeFile(tracePath, `${traceText}\n`, "utf8");

    const run: RunData = { ...makeRun("run-live"), spans: [], tracePath };
    const explorer = new TraceExplorer([run], { hasRunList: false, live: true });
    const monitor = new LiveTailMonitor(tracePath, 25);
    const { lastFrame, unmount } = render(<App explorer={explorer} monitor={monitor} />);

    await delay(250);
    expect(explorer.state.visible.map((node) => node.key)).toEqual(["r", "s"]);
    expect(lastFrame()).toContain("🔹 plan");
    expect(explorer.state.lastUpdateMs).not.toBeNull();
    unmount();
  });
});
