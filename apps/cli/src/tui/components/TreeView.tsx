import { Box, Text } from "ink";
import type { TreeLine } from "@spanscope/core";

export interface TreeViewProps {
  lines: TreeLine[];
  focused: boolean;
  width: number;
}

function lineColor(line: TreeLine): { color?: string } {
  if (line.error) return { color: "red" };
  if (line.match) return { color: "yellow" };
  switch (line.kind) {
    case "llm":
      return { color: "magenta" };
    case "tool":
      return { color: "green" };
    case "workflow":
      return { color: "cyan" };
    default:
      return {};
  }
}

export function TreeView({ lines, focused, width }: TreeViewProps) {
  return (
    <Box
      flexDirection="column"
      width={width}
      borderStyle="round"
      borderColor={focused ? "cyan" : "gray"}
      paddingX={1}
    >
      <Text bold color="cyan">
        Spans
      </Text>
      {lines.length === 0 ? <Text dimColor>No spans in this trace</Text> : null}
      {lines.map((line) => (
        <Text
          key={line.key}
          inverse={line.selected}
          {...lineColor(line)}
          dimColor={line.internal && !line.selected}
          wrap="truncate-end"
        >
          {line.text}
        </Text>
      ))}
    </Box>
  );
}
