import { Box } from "ink";
import type { DetailTab } from "@spanscope/contracts";
import type { ViewLine } from "@spanscope/core";
import { Lines } from "./Lines.js";
import { TabBar } from "./TabBar.js";

export interface DetailPanelProps {
  tab: DetailTab;
  lines: ViewLine[];
  scroll: number;
  height: number;
  focused: boolean;
}

export function DetailPanel({ tab, lines, scroll, height, focused }: DetailPanelProps) {
  return (
    <Box flexDirection="column" flexGrow={1} borderStyle="round" borderColor={focused ? "cyan" : "gray"} paddingX={1}>
      <TabBar selected={tab} />
      <Lines lines={lines} offset={scroll} height={Math.max(1, height - 3)} />
    </Box>
  );
}
