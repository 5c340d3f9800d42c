import { Box, Text, useInput } from 'ink';

type SetupErrorProps = {
  message: string;
  onBack: () => void;
};

function SetupError({ message, onBack }: SetupErrorProps) {
  useInput(() => onBack());

  return (
    <Box flexDirection="column" alignItems="center" paddingY={1}>
      <Text bold color="red">
        Could not start the game
      </Text>
      <Box marginY={1}>
        <Text>{message}</Text>
      </Box>
      <Text dimColor>Press any key to return to the menu</Text>
    </Box>
  );
}

export default SetupError;
