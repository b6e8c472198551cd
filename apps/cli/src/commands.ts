import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AppConfig, RunData } from "@spanscope/contracts";
import {
  CONFIG_KEYS,
  collectTraceObject,
  EXPORT_FORMATS,
  exportSpansText,
  formatCost,
  getConfigValue,
  isConfigKey,
  isSuccessfulStatus,
  loadAllRuns,
  loadConfig,
  loadRun,
  manifestToJson,
  mergeConfig,
  parseExportFormat,
  renderMermaid,
  resolveRunPath,
  runsDirectory,
  saveConfig,
  setConfigValue,
} from "@spanscope/core";

export interface GlobalOptions {
  config: string;
  runsDir?: string;
}

export interface CliContext {
  configPath: string;
  config: AppConfig;
}

export interface OutputOptions {
  output?: string;
}

export async function resolveContext(opts: GlobalOptions): Promise<CliContext> {
  const loaded = await loadConfig(opts.config);
  const config = opts.runsDir ? mergeConfig({ ...loaded, runs: { ...loaded.runs, directory: opts.runsDir } }) : loaded;
  return { configPath: opts.config, config };
}

export function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function fmtSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

function fmtTime(iso: string | null): string {
  if (!iso) return "-";
  return iso.replace("T", " ").replace(/\.\d+Z$/, "Z");
}

/** Writes `content` to `output`, or prints it when no output path was given. */
async function emit(content: string, opts: OutputOptions, what: string): Promise<void> {
  if (!opts.output) {
    console.log(content);
    return;
  }
  const target = path.resolve(opts.output);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content.endsWith("\n") ? content : `${content}\n`, "utf8");
  console.log(`wrote ${what} to ${target}`);
}

/** Loads every run for the explorer, reporting unreadable ones on stderr. */
export async function loadRunsForExplorer(ctx: CliContext): Promise<RunData[]> {
  const { runs, failures } = await loadAllRuns(ctx.config);
  for (const failure of failures) {
    console.error(`skipping run: ${failure.message}`);
  }
  return runs;
}

export async function loadSelectedRun(ctx: CliContext, runId?: string): Promise<RunData> {
  const runPath = await resolveRunPath(ctx.config, runId);
  return loadRun(runPath, ctx.config);
}

export async function listRuns(ctx: CliContext, opts: { json?: boolean }): Promise<void> {
  const runs = await loadRunsForExplorer(ctx);
  if (opts.json) {
    console.log(JSON.stringify(runs.map((run) => manifestToJson(run.manifest)), null, 2));
    return;
  }
  if (runs.length === 0) {
    console.log(noRunsMessage(ctx));
    return;
  }
  printTable([
    ["run_id", "command", "status", "duration", "llm_calls", "tokens"],
    ...runs.map(({ manifest }) => [
      manifest.runId,
      manifest.command,
      isSuccessfulStatus(manifest.status) ? "OK" : "FAIL",
      fmtSeconds(manifest.durationSeconds),
      String(manifest.llmCalls),
      String(manifest.totalTokens),
    ]),
  ]);
}

export async function viewRun(ctx: CliContext, runId?: string): Promise<void> {
  const run = await loadSelectedRun(ctx, runId);
  const { manifest } = run;
  const row = (label: string, value: string): string => `${`${label}:`.padEnd(21)}${value}`;
  const rule = "─".repeat(60);
  const lines = [
    "Run Information",
    rule,
    row("Run ID", manifest.runId),
    row("Command", manifest.command),
    row("Status", `${isSuccessfulStatus(manifest.status) ? "OK" : "FAIL"} (${manifest.status || "unknown"})`),
    row("Started", fmtTime(manifest.startTime)),
    row("Completed", fmtTime(manifest.endTime)),
    row("Duration", fmtSeconds(manifest.durationSeconds)),
    "",
    "Execution Stats",
    rule,
    row("Spans", String(manifest.spanCount)),
    row("LLM Calls", String(manifest.llmCalls)),
    row("Total Tokens", String(manifest.totalTokens)),
    row("Estimated Cost", formatCost(manifest.estimatedCost)),
    "",
    "Files",
    rule,
    row("Trace", run.tracePath),
    row("Manifest", manifest.derived ? "(derived from trace)" : path.join(run.runPath, ctx.config.runs.manifestFileName)),
  ];
  console.log(lines.join("\n"));
}

export async function auditRun(ctx: CliContext, runId: string | undefined, opts: OutputOptions): Promise<void> {
  const run = await loadSelectedRun(ctx, runId);
  const traceObject = collectTraceObject(run.spans, {
    runId: run.manifest.runId,
    command: run.manifest.command,
    config: ctx.config,
  });
  await emit(JSON.stringify(traceObject, null, 2), opts, "audit");
}

export async function mermaidRun(ctx: CliContext, runId: string | undefined, opts: OutputOptions): Promise<void> {
  const run = await loadSelectedRun(ctx, runId);
  const traceObject = collectTraceObject(run.spans, { runId: run.manifest.runId, config: ctx.config });
  const content = [
    `# Agent Trace: ${traceObject.runId}`,
    "",
    `**Events:** ${traceObject.summary.totalEvents} | **Duration:** ${traceObject.summary.totalDurationMs}ms`,
    "",
    "## Execution Flow",
    "",
    renderMermaid(traceObject).trimEnd(),
  ].join("\n");
  await emit(content, opts, "mermaid diagram");
}

export async function exportRun(
  ctx: CliContext,
  runId: string | undefined,
  opts: OutputOptions & { format: string },
): Promise<void> {
  const format = parseExportFormat(opts.format);
  if (!format) {
    throw new Error(`unsupported export format: ${opts.format} (expected ${EXPORT_FORMATS.join(", ")})`);
  }
  const run = await loadSelectedRun(ctx, runId);
  await emit(exportSpansText(run.spans, format), opts, `${format} export`);
}

export async function configGet(configPath: string, key?: string): Promise<void> {
  const config = await loadConfig(configPath);
  if (key === undefined) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }
  if (!isConfigKey(key)) {
    throw new Error(`unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
  }
  console.log(String(getConfigValue(config, key)));
}

export async function configSet(configPath: string, key: string, value: string): Promise<void> {
  if (!isConfigKey(key)) {
    throw new Error(`unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
  }
  const config = setConfigValue(await loadConfig(configPath), key, value);
  await saveConfig(config, configPath);
  console.log(`updated ${key} = ${String(getConfigValue(config, key))}`);
}

export function noRunsMessage(ctx: CliContext): string {
  return `No runs found in ${runsDirectory(ctx.config)}.`;
}
