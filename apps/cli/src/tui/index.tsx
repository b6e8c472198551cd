import { render } from "ink";
import type { AppConfig, RunData } from "@spanscope/contracts";
import { LiveTailMonitor, TraceExplorer } from "@spanscope/core";
import { App } from "./App.js";

export interface ExplorerLaunchOptions {
  config: AppConfig;
  /** Single-run mode: hides the run list and follows the run's trace file. */
  live?: boolean;
}

/** Renders the explorer full screen and resolves once the user quits. */
export async function runExplorer(runs: RunData[], options: ExplorerLaunchOptions): Promise<void> {
  const live = options.live ?? false;
  const explorer = new TraceExplorer(runs, {
    config: options.config,
    hasRunList: !live,
    live,
    width: process.stdout.columns || 120,
    height: process.stdout.rows || 40,
  });
  const tracePath = runs[0]?.tracePath;
  const monitor = live && tracePath ? new LiveTailMonitor(tracePath, options.config.live.pollIntervalMs) : undefined;

  const instance = render(<App explorer={explorer} {...(monitor ? { monitor } : {})} />, { exitOnCtrlC: false });
  try {
    await instance.waitUntilExit();
  } finally {
    monitor?.stop();
  }
}
