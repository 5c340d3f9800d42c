import { Box, Text } from 'ink';
import { MAX_NAME_LENGTH, type LeaderboardEntry } from '../leaderboard/leaderboard';

type ScoreTableProps = {
  entries: LeaderboardEntry[];
};

export const formatScoreRow = (entry: LeaderboardEntry, index: number): string =>
  `${String(index + 1).padStart(2)}. ${entry.name.padEnd(MAX_NAME_LENGTH)} ${String(entry.score).padStart(6)}`;

export function ScoreTable({ entries }: ScoreTableProps) {
  if (entries.length === 0) {
    return <Text dimColor>No high scores yet</Text>;
  }

  return (
    <Box flexDirection="column">
      {entries.map((entry, index) => (
        <Text key={`${entry.name}-${index}`} color={index === 0 ? 'yellow' : undefined}>
          {formatScoreRow(entry, index)}
        </Text>
      ))}
    </Box>
  );
}
