import { describe, expect, it } from "vitest";
import { at, makeSpan } from "./__tests__/spanFactory.js";
import { classifySpan, collectTraceObject, reasoningPath, spanToEvent, typeBreakdown } from "./audit.js";

const spans = [
  makeSpan({
    name: "agk.agent.run",
    spanId: "agent",
    start: at(0),
    end: at(2000),
    attrs: { "agk.prompt.user": "hello", "agk.agent.name": "planner" },
  }),
  makeSpan({
    name: "agent.tool.invoke",
    spanId: "tool",
    parentId: "agent",
    start: at(500),
    end: at(700),
    attrs: { "agk.tool.arguments": '{"q":1}', "agk.tool.result": "res" },
  }),
  makeSpan({
    name: "agk.llm.generate",
    spanId: "llm",
    parentId: "agent",
    start: at(1000),
    end: at(1500),
    attrs: { "agk.llm.response": "done", "agk.stream.tokens": 100 },
  }),
  makeSpan({ name: "agk.workflow.sequential", spanId: "wf" }),
];

describe("event classification", () => {
  it("checks name substrings in priority order", () => {
    expect(classifySpan("agent.tool.invoke")).toBe("tool_call");
    expect(classifySpan("Agent.LLM.call")).toBe("llm_call");
    expect(classifySpan("agk.agent.run")).toBe("thought");
    expect(classifySpan("agk.workflow.step")).toBe("decision");
    expect(classifySpan("db.query")).toBe("thought");
  });

  it("copies attributes into metadata and picks content by event type", () => {
    const event = spanToEvent(spans[1] ?? makeSpan({ name: "", spanId: "" }));
    expect(event.type).toBe("tool_call");
    expect(event.content).toBe('{"q":1}');
    expect(event.metadata).toEqual({ "agk.tool.arguments": '{"q":1}', "agk.tool.result": "res" });
    expect(event.durationMs).toBe(200);
    expect(event.timestamp).toBe(at(500));
    expect(event.parentId).toBe("agent");
  });

  it("leaves the timestamp null for an unparseable start", () => {
    const event = spanToEvent(makeSpan({ name: "x", spanId: "x", start: "soon" }));
    expect(event.timestamp).toBeNull();
    expect(event.content).toBeUndefined();
  });
});

describe("trace object", () => {
  it("orders events by time with undated events first", () => {
    const trace = collectTraceObject(spans, { runId: "run-1", command: "chat" });
    expect(trace.events.map((event) => event.spanId)).toEqual(["wf", "agent", "tool", "llm"]);
    expect(reasoningPath(trace)).toEqual(["decision", "thought", "tool_call", "llm_call"]);
    expect(trace.runId).toBe("run-1");
    expect(trace.command).toBe("chat");
    expect(trace.startTime).toBe(at(0));
    expect(trace.endTime).toBe(at(1000));
  });

  it("summarises counts, duration, tokens and output", () => {
    const trace = collectTraceObject(spans, { runId: "run-1" });
    expect(trace.summary.totalEvents).toBe(4);
    expect(trace.summary.typeCounts).toEqual({
      thought: 1,
      tool_call: 1,
      observation: 0,
      llm_call: 1,
      decision: 1,
    });
    expect(trace.summary.thoughtCount).toBe(1);
    expect(trace.summary.toolCallCount).toBe(1);
    expect(trace.summary.llmCallCount).toBe(1);
    expect(trace.summary.totalDurationMs).toBe(1000);
    expect(trace.summary.tokensUsed).toBe(100);
    expect(trace.summary.estimatedCost).toBeCloseTo(0.001, 10);
    expect(trace.summary.hasDetailedData).toBe(true);
    expect(trace.finalOutput).toBe("done");
    expect(trace.command).toBeUndefined();
    expect(typeBreakdown(trace)).toEqual([
      ["thought", 1],
      ["tool_call", 1],
      ["llm_call", 1],
      ["decision", 1],
    ]);
  });

  it("reports an empty trace without detailed data", () => {
    const trace = collectTraceObject([], { runId: "empty" });
    expect(trace.events).toEqual([]);
    expect(trace.startTime).toBeNull();
    expect(trace.summary.totalDurationMs).toBe(0);
    expect(trace.summary.hasDetailedData).toBe(false);
    expect(trace.finalOutput).toBeUndefined();
  });
});
