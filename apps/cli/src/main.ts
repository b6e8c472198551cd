#!/usr/bin/env node
import { Command } from "commander";
import { DEFAULT_CONFIG_PATH, EXPORT_FORMATS } from "@spanscope/core";
import type { CliContext, GlobalOptions } from "./commands.js";
import {
  auditRun,
  configGet,
  configSet,
  exportRun,
  listRuns,
  loadRunsForExplorer,
  loadSelectedRun,
  mermaidRun,
  noRunsMessage,
  resolveContext,
  viewRun,
} from "./commands.js";
import { runExplorer } from "./tui/index.js";

const program = new Command();
program.name("spanscope").description("Explore, measure and diagram agent execution traces");
program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
program.option("--runs-dir <dir>", "Directory holding one sub-directory per run");
program.addHelpText(
  "after",
  `
Examples:
  $ spanscope trace
  $ spanscope list --json
  $ spanscope show latest
  $ spanscope mermaid latest --output flow.md
  $ spanscope export run-20260101-chat --format otel
`,
);

function context(): Promise<CliContext> {
  return resolveContext(program.opts<GlobalOptions>());
}

program
  .command("trace")
  .description("Browse every run in the interactive explorer")
  .action(async () => {
    const ctx = await context();
    const runs = await loadRunsForExplorer(ctx);
    if (runs.length === 0) {
      console.log(noRunsMessage(ctx));
      return;
    }
    await runExplorer(runs, { config: ctx.config });
  });

program
  .command("list")
  .description("List runs, newest first")
  .option("--json", "JSON output")
  .action(async (opts: { json?: boolean }) => {
    await listRuns(await context(), opts);
  });

program
  .command("show [run-id]")
  .description("Open one run in the explorer and follow its trace file (default: latest)")
  .action(async (runId: string | undefined) => {
    const ctx = await context();
    const run = await loadSelectedRun(ctx, runId);
    await runExplorer([run], { config: ctx.config, live: true });
  });

program
  .command("view [run-id]")
  .description("Print the run manifest summary (default: latest)")
  .action(async (runId: string | undefined) => {
    await viewRun(await context(), runId);
  });

program
  .command("audit [run-id]")
  .description("Classify spans into reasoning events and print the trace object as JSON")
  .option("--output <file>", "Write to a file instead of stdout")
  .action(async (runId: string | undefined, opts: { output?: string }) => {
    await auditRun(await context(), runId, opts);
  });

program
  .command("mermaid [run-id]")
  .description("Render the run as a Mermaid flowchart")
  .option("--output <file>", "Write to a file instead of stdout")
  .action(async (runId: string | undefined, opts: { output?: string }) => {
    await mermaidRun(await context(), runId, opts);
  });

program
  .command("export [run-id]")
  .description("Export spans for external tools")
  .option("--format <format>", `Export format: ${EXPORT_FORMATS.join(", ")}`, "json")
  .option("--output <file>", "Write to a file instead of stdout")
  .action(async (runId: string | undefined, opts: { format: string; output?: string }) => {
    await exportRun(await context(), runId, opts);
  });

const configCmd = program.command("config").description("Configuration");

configCmd
  .command("get [key]")
  .description("Print the effective configuration, or one dotted key")
  .action(async (key: string | undefined) => {
    await configGet(program.opts<GlobalOptions>().config, key);
  });

configCmd
  .command("set <key> <value>")
  .description("Set one dotted key and save the file")
  .action(async (key: string, value: string) => {
    await configSet(program.opts<GlobalOptions>().config, key, value);
  });

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
