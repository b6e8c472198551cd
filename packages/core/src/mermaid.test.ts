import { describe, expect, it } from "vitest";
import type { Span } from "@spanscope/contracts";
import { at, makeSpan } from "./__tests__/spanFactory.js";
import { collectTraceObject } from "./audit.js";
import { diagramEdges, formatNodeLabel, renderMermaid } from "./mermaid.js";

function traceOf(spans: Span[]) {
  return collectTraceObject(spans, { runId: "run-1" });
}

function edgesOf(spans: Span[]): string[] {
  return diagramEdges(traceOf(spans)).map((edge) => `n${edge.from}->n${edge.to}`);
}

describe("mermaid edges", () => {
  it("chains sequential steps in step order and hangs each step's work off it", () => {
    const spans = [
      makeSpan({ name: "agk.workflow.sequential", spanId: "wf", start: at(0) }),
      makeSpan({
        name: "agk.workflow.step",
        spanId: "b",
        parentId: "wf",
        start: at(200),
        attrs: { "agk.workflow.step_name": "B", "agk.workflow.step_index": 1 },
      }),
      makeSpan({
        name: "agk.workflow.step",
        spanId: "a",
        parentId: "wf",
        start: at(100),
        attrs: { "agk.workflow.step_name": "A", "agk.workflow.step_index": 0 },
      }),
      makeSpan({
        name: "agk.workflow.step",
        spanId: "c",
        parentId: "wf",
        start: at(300),
        attrs: { "agk.workflow.step_name": "C", "agk.workflow.step_index": "2" },
      }),
      makeSpan({ name: "agk.llm.generate", spanId: "llm", parentId: "a", start: at(110) }),
      makeSpan({ name: "agk.tool.call", spanId: "tool", parentId: "a", start: at(150) }),
    ];
    // event order: wf, a, llm, tool, b, c
    const edges = edgesOf(spans);
    expect(edges).toEqual(["n0->n1", "n1->n4", "n4->n5", "n1->n2", "n2->n3"]);
    expect(edges).not.toContain("n1->n5");
    expect(edges).not.toContain("n1->n3");
  });

  it("leaves nested steps to the general parent edges", () => {
    const spans = [
      makeSpan({ name: "agk.workflow.sequential", spanId: "wf", start: at(0) }),
      makeSpan({
        name: "agk.workflow.step",
        spanId: "a",
        parentId: "wf",
        start: at(100),
        attrs: { "agk.workflow.step_index": 0 },
      }),
      makeSpan({ name: "agk.workflow.step", spanId: "inner", parentId: "a", start: at(150) }),
      makeSpan({ name: "agk.llm.generate", spanId: "llm", parentId: "inner", start: at(160) }),
    ];
    expect(edgesOf(spans)).toEqual(["n0->n1", "n1->n2", "n2->n3"]);
  });

  it("fans out ordinary parents and ignores unresolved parents", () => {
    const spans = [
      makeSpan({ name: "agk.agent.run", spanId: "root", start: at(0) }),
      makeSpan({ name: "agk.tool.search", spanId: "t1", parentId: "root", start: at(10) }),
      makeSpan({ name: "agk.tool.fetch", spanId: "t2", parentId: "root", start: at(20) }),
      makeSpan({ name: "agk.llm.generate", spanId: "lost", parentId: "missing", start: at(30) }),
    ];
    expect(edgesOf(spans)).toEqual(["n0->n1", "n0->n2"]);
  });
});

describe("mermaid labels", () => {
  it("uses the step name, agent name and duration", () => {
    const [step, agent] = traceOf([
      makeSpan({ name: "agk.workflow.step", spanId: "s", start: at(0), attrs: { "agk.workflow.step_name": "A" } }),
      makeSpan({
        name: "agk.agent.run",
        spanId: "r",
        start: at(10),
        end: at(1510),
        attrs: { "agk.agent.name": "planner" },
      }),
    ]).events;
    expect(step && formatNodeLabel(step)).toBe("⚡ step:A");
    expect(agent && formatNodeLabel(agent)).toBe("💭 agk.agent.run @planner<br/>1500ms");
  });

  it("truncates long descriptions to sixty characters", () => {
    const [event] = traceOf([makeSpan({ name: "x".repeat(70), spanId: "x" })]).events;
    expect(event && formatNodeLabel(event)).toBe(`💭 ${"x".repeat(57)}...`);
  });

  it("truncates by code point so an emoji is never split", () => {
    const [event] = traceOf([makeSpan({ name: `${"a".repeat(56)}${"🤖".repeat(5)}`, spanId: "e" })]).events;
    expect(event && formatNodeLabel(event)).toBe(`💭 ${"a".repeat(56)}🤖...`);
  });
});

describe("mermaid rendering", () => {
  it("renders an empty trace as a bare flowchart", () => {
    expect(renderMermaid(traceOf([]))).toBe("```mermaid\nflowchart TD\n```\n");
    expect(renderMermaid(traceOf([]), { fence: false })).toBe("flowchart TD\n");
  });

  it("writes nodes, edges and styles in that order", () => {
    const output = renderMermaid(
      traceOf([
        makeSpan({ name: "agk.agent.run", spanId: "r", start: at(0) }),
        makeSpan({ name: "agk.tool.call", spanId: "t", parentId: "r", start: at(10) }),
      ]),
      { fence: false },
    );
    expect(output).toBe(
      [
        "flowchart TD",
        '    n0(["💭 agk.agent.run"])',
        '    n1[["🔧 agk.tool.call"]]',
        "    n0 --> n1",
        "    style n0 fill:#e1f5fe,stroke:#01579b,stroke-width:1px",
        "    style n1 fill:#e8f5e9,stroke:#1b5e20,stroke-width:1px",
        "",
      ].join("\n"),
    );
  });

  it("escapes double quotes in labels", () => {
    const output = renderMermaid(traceOf([makeSpan({ name: 'say "hi"', spanId: "q" })]), { fence: false });
    expect(output.split("\n")[1]).toBe('    n0(["💭 say #quot;hi#quot;"])');
  });
});
