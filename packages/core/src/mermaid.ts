import type { EventType, TraceEvent, TraceObject } from "@spanscope/contracts";
import { isRootParentId, truncateText } from "./utils.js";

export interface DiagramEdge {
  from: number;
  to: number;
}

export interface RenderMermaidOptions {
  fence?: boolean;
}

interface NodeStyle {
  icon: string;
  open: string;
  close: string;
  fill: string;
  stroke: string;
}

const NODE_STYLES: Record<EventType, NodeStyle> = {
  thought: { icon: "💭", open: "([", close: "])", fill: "#e1f5fe", stroke: "#01579b" },
  tool_call: { icon: "🔧", open: "[[", close: "]]", fill: "#e8f5e9", stroke: "#1b5e20" },
  observation: { icon: "👁", open: "[/", close: "/]", fill: "#fff3e0", stroke: "#e65100" },
  llm_call: { icon: "🤖", open: "{", close: "}", fill: "#f3e5f5", stroke: "#4a148c" },
  decision: { icon: "⚡", open: "{{", close: "}}", fill: "#fce4ec", stroke: "#880e4f" },
};

const MAX_LABEL_CHARS = 60;

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

function isSequentialWorkflow(event: TraceEvent): boolean {
  return event.spanName.toLowerCase().includes("workflow.sequential");
}

function isStepEvent(event: TraceEvent): boolean {
  return event.spanName.toLowerCase().includes("workflow.step") || nonEmptyString(event.metadata["agk.workflow.step_name"]) !== null;
}

function stepIndexOf(event: TraceEvent): number | null {
  const raw = event.metadata["agk.workflow.step_index"];
  if (typeof raw === "number" && Number.isFinite(raw)) return Math.trunc(raw);
  if (typeof raw === "string" && /^[+-]?\d+$/.test(raw.trim())) return Number.parseInt(raw.trim(), 10);
  return null;
}

function chronological(events: TraceEvent[], a: number, b: number): number {
  const left = events[a]?.timestampMs ?? Number.NEGATIVE_INFINITY;
  const right = events[b]?.timestampMs ?? Number.NEGATIVE_INFINITY;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function compareSteps(events: TraceEvent[], a: number, b: number): number {
  const first = events[a];
  const second = events[b];
  const left = first ? stepIndexOf(first) : null;
  const right = second ? stepIndexOf(second) : null;
  if (left !== null && right !== null) return left - right;
  if (left !== null) return -1;
  if (right !== null) return 1;
  return chronological(events, a, b);
}

export function formatNodeLabel(event: TraceEvent): string {
  let description = event.spanName;
  const stepName = nonEmptyString(event.metadata["agk.workflow.step_name"]);
  if (stepName) description = `step:${stepName}`;
  const agentName = nonEmptyString(event.metadata["agk.agent.name"]);
  if (agentName) description = `${description} @${agentName}`;
  description = truncateText(description, MAX_LABEL_CHARS);
  const duration = event.durationMs > 0 ? `<br/>${event.durationMs}ms` : "";
  return `${NODE_STYLES[event.type].icon} ${description}${duration}`;
}

function buildChildIndex(events: TraceEvent[]): Map<number, number[]> {
  const bySpanId = new Map<string, number>();
  events.forEach((event, index) => {
    if (event.spanId && !bySpanId.has(event.spanId)) bySpanId.set(event.spanId, index);
  });

  const children = new Map<number, number[]>();
  events.forEach((event, index) => {
    if (isRootParentId(event.parentId)) return;
    const parent = bySpanId.get(event.parentId);
    if (parent === undefined || parent === index) return;
    const list = children.get(parent) ?? [];
    list.push(index);
    children.set(parent, list);
  });
  return children;
}

/**
 * Non-step descendants of a step in breadth-first order. Nested steps and sequential
 * containers are left alone so they keep their own edges.
 */
function collectStepDescendants(
  events: TraceEvent[],
  children: Map<number, number[]>,
  step: number,
  claimed: Set<number>,
): number[] {
  const out: number[] = [];
  const visited = new Set<number>([step]);
  const queue = [step];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const child of children.get(current) ?? []) {
      if (visited.has(child)) continue;
      visited.add(child);
      const event = events[child];
      if (!event || isStepEvent(event) || isSequentialWorkflow(event) || claimed.has(child)) continue;
      out.push(child);
      queue.push(child);
    }
  }
  return out;
}

/**
 * Edge list over event indices. Children of a sequential workflow that are steps are
 * chained in step order, each step's own work hangs off it as a chronological chain,
 * and every other resolved parent fans out to its children. No edge appears twice.
 */
export function diagramEdges(traceObject: TraceObject): DiagramEdge[] {
  const events = traceObject.events;
  const children = buildChildIndex(events);
  const parents = [...children.keys()].sort((a, b) => a - b);
  const edges: DiagramEdge[] = [];
  const seen = new Set<string>();
  const claimed = new Set<number>();

  const addEdge = (from: number, to: number): void => {
    const key = `${from}->${to}`;
    if (seen.has(key)) return;
    seen.add(key);
    edges.push({ from, to });
  };

  const addChain = (head: number, chain: number[]): void => {
    let previous = head;
    for (const next of chain) {
      addEdge(previous, next);
      previous = next;
    }
  };

  for (const parent of parents) {
    const event = events[parent];
    if (!event || !isSequentialWorkflow(event)) continue;
    const steps = (children.get(parent) ?? []).filter((child) => {
      const childEvent = events[child];
      return childEvent !== undefined && isStepEvent(childEvent) && !claimed.has(child);
    });
    steps.sort((a, b) => compareSteps(events, a, b));
    for (const step of steps) claimed.add(step);
    addChain(parent, steps);

    for (const step of steps) {
      const descendants = collectStepDescendants(events, children, step, claimed);
      descendants.sort((a, b) => chronological(events, a, b));
      for (const descendant of descendants) claimed.add(descendant);
      addChain(step, descendants);
    }
  }

  for (const parent of parents) {
    for (const child of children.get(parent) ?? []) {
      if (claimed.has(child)) continue;
      addEdge(parent, child);
    }
  }

  return edges;
}

function escapeLabel(label: string): string {
  return label.replace(/"/g, "#quot;");
}

/** Renders a top-down Mermaid flowchart; an empty trace yields just the header. */
export function renderMermaid(traceObject: TraceObject, options: RenderMermaidOptions = {}): string {
  const lines = ["flowchart TD"];

  traceObject.events.forEach((event, index) => {
    const style = NODE_STYLES[event.type];
    lines.push(`    n${index}${style.open}"${escapeLabel(formatNodeLabel(event))}"${style.close}`);
  });

  for (const edge of diagramEdges(traceObject)) {
    lines.push(`    n${edge.from} --> n${edge.to}`);
  }

  traceObject.events.forEach((event, index) => {
    const style = NODE_STYLES[event.type];
    lines.push(`    style n${index} fill:${style.fill},stroke:${style.stroke},stroke-width:1px`);
  });

  const body = lines.join("\n");
  if (options.fence === false) {
    return `${body}\n`;
  }
  return `\`\`\`mermaid\n${body}\n\`\`\`\n`;
}
