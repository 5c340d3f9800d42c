import { Box, Text, useInput } from 'ink';
import { DIFFICULTIES, DIFFICULTY_SETTINGS } from '../games/snake/constants';
import { type Difficulty } from '../games/snake/types';
import { mapKey } from '../terminal/keys';

type MenuProps = {
  onSelect: (difficulty: Difficulty) => void;
  onShowLeaderboard: () => void;
  onQuit: () => void;
};

export const describeDifficulty = (difficulty: Difficulty, index: number): string => {
  const { label, obstacleCount, moveIntervalMs } = DIFFICULTY_SETTINGS[difficulty];
  const obstacles = obstacleCount === 0 ? 'No obstacles' : `${obstacleCount} obstacles`;
  return `${index + 1}. ${label} (${obstacles}, ${moveIntervalMs / 1000}s speed)`;
};

function Menu({ onSelect, onShowLeaderboard, onQuit }: MenuProps) {
  useInput((input, key) => {
    const mapped = mapKey(input, key);
    if (mapped?.type === 'quit') {
      onQuit();
      return;
    }
    if (mapped?.type !== 'char') return;

    if (mapped.value.toLowerCase() === 'l') {
      onShowLeaderboard();
      return;
    }
    const difficulty = DIFFICULTIES[Number(mapped.value) - 1];
    if (difficulty) onSelect(difficulty);
  });

  return (
    <Box flexDirection="column" alignItems="center" paddingY={1}>
      <Text bold color="green">
        SNAKE GAME
      </Text>
      <Box marginTop={1}>
        <Text>Select Difficulty:</Text>
      </Box>
      <Box flexDirection="column" marginY={1}>
        {DIFFICULTIES.map((difficulty, index) => (
          <Text key={difficulty}>{describeDifficulty(difficulty, index)}</Text>
        ))}
      </Box>
      <Text dimColor>Press 1, 2, 3, or 4 to select difficulty, 'l' for high scores, or 'q' to quit</Text>
    </Box>
  );
}

export default Menu;
