import { Box, Text } from 'ink';

type FrameProps = {
  lines: string[];
};

export function Frame({ lines }: FrameProps) {
  return (
    <Box flexDirection="column">
      {lines.map((line, index) => (
        <Text key={index} wrap="truncate">
          {line}
        </Text>
      ))}
    </Box>
  );
}
