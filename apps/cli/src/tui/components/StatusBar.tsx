import { Box, Text } from "ink";

export function StatusBar({ text, error }: { text: string; error: string | null }) {
  return (
    <Box flexDirection="column">
      {error ? (
        <Text color="red" wrap="truncate-end">
          live tail: {error}
        </Text>
      ) : null}
      <Text dimColor wrap="truncate-end">
        {text}
      </Text>
    </Box>
  );
}
