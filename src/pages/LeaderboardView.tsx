import { Box, Text, useInput } from 'ink';
import { ScoreTable } from '../components/ScoreTable';
import { DIFFICULTIES, DIFFICULTY_SETTINGS } from '../games/snake/constants';
import { type Difficulty } from '../games/snake/types';
import { type Leaderboard } from '../leaderboard/leaderboard';
import { mapKey } from '../terminal/keys';

type LeaderboardViewProps = {
  difficulty: Difficulty;
  leaderboard: Leaderboard;
  onChangeDifficulty: (difficulty: Difficulty) => void;
  onBack: () => void;
};

export const cycleDifficulty = (difficulty: Difficulty, step: 1 | -1): Difficulty => {
  const index = DIFFICULTIES.indexOf(difficulty);
  const next = (index + step + DIFFICULTIES.length) % DIFFICULTIES.length;
  return DIFFICULTIES[next];
};

function LeaderboardView({ difficulty, leaderboard, onChangeDifficulty, onBack }: LeaderboardViewProps) {
  useInput((input, key) => {
    const mapped = mapKey(input, key);
    if (mapped?.type === 'direction' && mapped.direction === 'left') {
      onChangeDifficulty(cycleDifficulty(difficulty, -1));
    } else if (mapped?.type === 'direction' && mapped.direction === 'right') {
      onChangeDifficulty(cycleDifficulty(difficulty, 1));
    } else {
      onBack();
    }
  });

  return (
    <Box flexDirection="column" alignItems="center" paddingY={1}>
      <Text bold color="green">
        HIGH SCORES - {DIFFICULTY_SETTINGS[difficulty].label.toUpperCase()}
      </Text>
      <Box marginY={1}>
        <ScoreTable entries={leaderboard[difficulty]} />
      </Box>
      <Text dimColor>Left/Right: change difficulty, any other key: back to menu</Text>
    </Box>
  );
}

export default LeaderboardView;
