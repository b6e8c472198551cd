import { Box, Text } from "ink";
import type { ViewLine } from "@spanscope/core";
import { TONE_STYLES } from "../theme.js";

export interface LinesProps {
  lines: ViewLine[];
  offset?: number;
  height: number;
}

/** A fixed-height window onto pre-rendered view lines. */
export function Lines({ lines, offset = 0, height }: LinesProps) {
  const start = Math.max(0, Math.min(offset, Math.max(0, lines.length - 1)));
  const shown = lines.slice(start, start + Math.max(1, height));
  return (
    <Box flexDirection="column">
      {shown.map((line, i) => (
        <Text key={start + i} wrap="truncate-end" {...TONE_STYLES[line.tone]}>
          {line.text || " "}
        </Text>
      ))}
    </Box>
  );
}
