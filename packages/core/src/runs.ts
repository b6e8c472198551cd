import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { AppConfig, RunData, RunManifest, Span } from "@spanscope/contracts";
import { classifySpan } from "./audit.js";
import { DEFAULT_CONFIG } from "./config.js";
import { TraceReadError, UnknownRunError } from "./errors.js";
import { estimateCost, totalTokens } from "./metrics.js";
import { readSpanFile } from "./parsers/index.js";
import { asRecord, expandHome, parseRfc3339 } from "./utils.js";

export interface DiscoveredRun {
  runId: string;
  runPath: string;
  tracePath: string;
  manifestPath: string;
  mtimeMs: number;
}

export interface LoadAllRunsResult {
  runs: RunData[];
  failures: TraceReadError[];
}

export function runsDirectory(config: AppConfig): string {
  return path.resolve(expandHome(config.runs.directory));
}

function toDiscoveredRun(runPath: string, config: AppConfig, mtimeMs: number): DiscoveredRun {
  return {
    runId: path.basename(runPath),
    runPath,
    tracePath: path.join(runPath, config.runs.traceFileName),
    manifestPath: path.join(runPath, config.runs.manifestFileName),
    mtimeMs,
  };
}

/** Immediate subdirectories of the runs directory; a missing directory has no runs. */
export async function discoverRuns(config: AppConfig): Promise<DiscoveredRun[]> {
  const root = runsDirectory(config);
  const entries = await fg("*", {
    cwd: root,
    absolute: true,
    onlyDirectories: true,
    dot: false,
    deep: 1,
    stats: true,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const runs = entries.map((entry) =>
    toDiscoveredRun(path.resolve(entry.path), config, entry.stats?.mtimeMs ?? 0),
  );
  return runs.sort((a, b) => b.runId.localeCompare(a.runId));
}

function pick(record: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

function numberField(record: Record<string, unknown>, ...keys: string[]): number {
  const value = pick(record, ...keys);
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string {
  const value = pick(record, ...keys);
  return typeof value === "string" ? value : "";
}

/** Accepts snake_case keys or PascalCase ones. */
export function manifestFromJson(raw: unknown, fallbackRunId: string): RunManifest | null {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return null;
  const record = asRecord(raw);
  const startTime = stringField(record, "start_time", "StartTime");
  const endTime = stringField(record, "end_time", "EndTime");
  return {
    runId: stringField(record, "run_id", "RunID") || fallbackRunId,
    command: stringField(record, "command", "Command"),
    status: stringField(record, "status", "Status"),
    startTime: startTime || null,
    endTime: endTime || null,
    durationSeconds: numberField(record, "duration_seconds", "Duration"),
    spanCount: Math.trunc(numberField(record, "span_count", "SpanCount")),
    llmCalls: Math.trunc(numberField(record, "llm_calls", "LLMCalls")),
    totalTokens: Math.trunc(numberField(record, "total_tokens", "TotalTokens")),
    estimatedCost: numberField(record, "estimated_cost", "EstimatedCost"),
    derived: false,
  };
}

export function manifestToJson(manifest: RunManifest): Record<string, string | number | null> {
  return {
    run_id: manifest.runId,
    command: manifest.command,
    status: manifest.status,
    start_time: manifest.startTime,
    end_time: manifest.endTime,
    duration_seconds: manifest.durationSeconds,
    span_count: manifest.spanCount,
    llm_calls: manifest.llmCalls,
    total_tokens: manifest.totalTokens,
    estimated_cost: manifest.estimatedCost,
  };
}

/** `run-<stamp>-<command...>` names carry the command; anything shorter ran the agent. */
export function commandFromRunId(runId: string): string {
  const parts = runId.split("-");
  return parts.length > 2 ? parts.slice(2).join("-") : "agent";
}

/**
 * Summarizes a run from its spans alone: the time range covers every parseable start
 * and end time, and the cost applies the configured per-token rate.
 */
export function deriveManifest(runId: string, spans: Span[], config: AppConfig = DEFAULT_CONFIG): RunManifest {
  let first: number | null = null;
  let last: number | null = null;
  let llmCalls = 0;

  for (const span of spans) {
    const start = parseRfc3339(span.startTime);
    const end = parseRfc3339(span.endTime);
    if (start !== null) {
      if (first === null || start < first) first = start;
      if (last === null || start > last) last = start;
    }
    if (end !== null && (last === null || end > last)) last = end;
    if (classifySpan(span.name) === "llm_call") llmCalls += 1;
  }
  if (first === null) first = last;

  const tokens = totalTokens(spans);
  return {
    runId,
    command: commandFromRunId(runId),
    status: "completed",
    startTime: first === null ? null : new Date(first).toISOString(),
    endTime: last === null ? null : new Date(last).toISOString(),
    durationSeconds: first === null || last === null ? 0 : (last - first) / 1000,
    spanCount: spans.length,
    llmCalls,
    totalTokens: tokens,
    estimatedCost: estimateCost(tokens, config.cost),
    derived: true,
  };
}

/** The sidecar manifest, or null when it is missing or not a JSON object. */
export async function readManifestFile(manifestPath: string, fallbackRunId: string): Promise<RunManifest | null> {
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch {
    return null;
  }
  try {
    return manifestFromJson(JSON.parse(text), fallbackRunId);
  } catch {
    return null;
  }
}

export async function readManifest(runPath: string, config: AppConfig = DEFAULT_CONFIG): Promise<RunManifest> {
  const run = toDiscoveredRun(runPath, config, 0);
  const sidecar = await readManifestFile(run.manifestPath, run.runId);
  if (sidecar) return sidecar;
  return deriveManifest(run.runId, await readSpanFile(run.tracePath), config);
}

/** Throws TraceReadError when the trace file cannot be read; the manifest is optional. */
export async function loadRun(runPath: string, config: AppConfig = DEFAULT_CONFIG): Promise<RunData> {
  const run = toDiscoveredRun(path.resolve(runPath), config, 0);
  const spans = await readSpanFile(run.tracePath);
  const manifest = (await readManifestFile(run.manifestPath, run.runId)) ?? deriveManifest(run.runId, spans, config);
  return {
    manifest,
    spans,
    runPath: run.runPath,
    tracePath: run.tracePath,
  };
}

/** Newest run id first. Runs whose trace cannot be read are reported, not thrown. */
export async function loadAllRuns(config: AppConfig = DEFAULT_CONFIG): Promise<LoadAllRunsResult> {
  const result: LoadAllRunsResult = { runs: [], failures: [] };
  for (const run of await discoverRuns(config)) {
    try {
      result.runs.push(await loadRun(run.runPath, config));
    } catch (error) {
      if (!(error instanceof TraceReadError)) throw error;
      result.failures.push(error);
    }
  }
  return result;
}

/** Most recently modified run directory. */
export async function latestRunId(config: AppConfig = DEFAULT_CONFIG): Promise<string | null> {
  const runs = await discoverRuns(config);
  let latest: DiscoveredRun | null = null;
  for (const run of runs) {
    if (!latest || run.mtimeMs > latest.mtimeMs) latest = run;
  }
  return latest?.runId ?? null;
}

/**
 * Resolves a run id (or `latest`, or nothing) to its directory. Unknown ids and an
 * empty runs directory raise UnknownRunError.
 */
export async function resolveRunPath(config: AppConfig, runId?: string): Promise<string> {
  const root = runsDirectory(config);
  const wanted = !runId || runId === "latest" ? await latestRunId(config) : runId;
  if (!wanted) {
    throw new UnknownRunError(runId ?? "latest", root);
  }
  const runPath = path.join(root, wanted);
  const runStat = await stat(runPath).catch(() => null);
  if (!runStat?.isDirectory()) {
    throw new UnknownRunError(wanted, root);
  }
  return runPath;
}
