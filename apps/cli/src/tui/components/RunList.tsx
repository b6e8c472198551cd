import { Box, Text } from "ink";
import type { RunManifest } from "@spanscope/contracts";
import { runListRows } from "@spanscope/core";

export interface RunListProps {
  manifests: RunManifest[];
  cursor: number;
  height: number;
}

export function RunList({ manifests, cursor, height }: RunListProps) {
  const rows = runListRows(manifests, cursor, height);
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Box justifyContent="space-between" marginBottom={1}>
        <Text bold color="cyan">
          Runs
        </Text>
        <Text dimColor>({manifests.length})</Text>
      </Box>
      {rows.length === 0 ? <Text dimColor>No runs found</Text> : null}
      {rows.map((row) => (
        <Text key={row.runId} inverse={row.selected} wrap="truncate-end" {...(row.ok ? {} : { color: "red" })}>
          {row.selected ? "> " : "  "}
          {row.text}
        </Text>
      ))}
    </Box>
  );
}
