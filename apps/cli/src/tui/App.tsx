import { useEffect, useReducer, useState } from "react";
import { Box, useApp, useInput, useStdout } from "ink";
import type { LiveTailMonitor, LiveTailUpdate, TraceExplorer } from "@spanscope/core";
import { detailLines, metadataLines, runSummaryLines, statusBarText, treeWindow } from "@spanscope/core";
import { DetailPanel } from "./components/DetailPanel.js";
import { Lines } from "./components/Lines.js";
import { MetadataPanel } from "./components/MetadataPanel.js";
import { RunList } from "./components/RunList.js";
import { StatusBar } from "./components/StatusBar.js";
import { TreeView } from "./components/TreeView.js";
import { normalizeKey } from "./keys.js";

export interface AppProps {
  explorer: TraceExplorer;
  /** Follows the selected run's trace file and feeds every update to the explorer. */
  monitor?: LiveTailMonitor;
}

export function App({ explorer, monitor }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [, redraw] = useReducer((count: number) => count + 1, 0);
  const [liveError, setLiveError] = useState<string | null>(null);

  useEffect(() => {
    const onResize = (): void => {
      explorer.resize(stdout.columns || 120, stdout.rows || 40);
      redraw();
    };
    onResize();
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [explorer, stdout]);

  useEffect(() => {
    if (!monitor) return undefined;
    const onUpdate = (update: LiveTailUpdate): void => {
      explorer.ingestSpans(update.spans);
      setLiveError(null);
      redraw();
    };
    const onError = (error: unknown): void => {
      setLiveError(error instanceof Error ? error.message : String(error));
    };
    monitor.on("update", onUpdate);
    monitor.on("error", onError);
    monitor.start();
    return () => {
      monitor.stop();
      monitor.off("update", onUpdate);
      monitor.off("error", onError);
    };
  }, [explorer, monitor]);

  useInput((input, key) => {
    const name = normalizeKey(input, key);
    if (!name) return;
    if (explorer.handleKey(name) === "quit") {
      exit();
      return;
    }
    redraw();
  });

  const state = explorer.state;
  const status = <StatusBar text={statusBarText(state)} error={liveError} />;

  if (state.view === "run_list") {
    return (
      <Box flexDirection="column">
        <RunList manifests={state.runs.map((run) => run.manifest)} cursor={state.runCursor} height={state.height} />
        {status}
      </Box>
    );
  }

  const selected = explorer.selectedNode();
  const summary = runSummaryLines({
    manifest: explorer.manifest,
    metrics: state.metrics,
    estimatedCost: state.estimatedCost,
  });
  const bodyHeight = Math.max(6, state.height - summary.length - 2);
  const details = detailLines(selected, state.tab, state.forest, explorer.previewChars);

  if (state.view === "detail") {
    return (
      <Box flexDirection="column">
        <Lines lines={summary} height={summary.length} />
        <DetailPanel tab={state.tab} lines={details} scroll={state.detailScroll} height={bodyHeight} focused />
        {status}
      </Box>
    );
  }

  const treeWidth = Math.max(30, Math.floor(state.width * 0.45));
  const detailHeight = Math.ceil(bodyHeight * 0.6);
  const treeRows = treeWindow(state.visible, state.cursor, bodyHeight - 3, explorer.matchKeys());

  return (
    <Box flexDirection="column">
      <Lines lines={summary} height={summary.length} />
      <Box height={bodyHeight}>
        <TreeView lines={treeRows} focused={state.focus === "tree"} width={treeWidth} />
        <Box flexDirection="column" flexGrow={1}>
          <DetailPanel
            tab={state.tab}
            lines={details}
            scroll={state.detailScroll}
            height={detailHeight}
            focused={state.focus === "details"}
          />
          <MetadataPanel
            lines={metadataLines(selected, state.forest, explorer.perTokenUsd)}
            scroll={state.metadataScroll}
            height={bodyHeight - detailHeight}
            focused={state.focus === "metadata"}
          />
        </Box>
      </Box>
      {status}
    </Box>
  );
}
