import { Box } from "ink";
import type { ViewLine } from "@spanscope/core";
import { Lines } from "./Lines.js";

export interface MetadataPanelProps {
  lines: ViewLine[];
  scroll: number;
  height: number;
  focused: boolean;
}

export function MetadataPanel({ lines, scroll, height, focused }: MetadataPanelProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={focused ? "cyan" : "gray"} paddingX={1}>
      <Lines lines={lines} offset={scroll} height={Math.max(1, height - 2)} />
    </Box>
  );
}
