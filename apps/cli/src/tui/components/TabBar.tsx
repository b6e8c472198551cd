import { Box, Text } from "ink";
import type { DetailTab } from "@spanscope/contracts";
import { tabBar } from "@spanscope/core";

export function TabBar({ selected }: { selected: DetailTab }) {
  return (
    <Box>
      {tabBar(selected).map((entry, i) => (
        <Text key={entry.tab} inverse={entry.active} {...(entry.active ? { color: "cyan" } : {})}>
          {` ${i + 1}:${entry.label} `}
        </Text>
      ))}
    </Box>
  );
}
