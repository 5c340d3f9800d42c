import { Box, Text, useInput } from 'ink';
import { useState } from 'react';
import { DIFFICULTY_SETTINGS } from '../games/snake/constants';
import { type Difficulty } from '../games/snake/types';
import { MAX_NAME_LENGTH, isValidName, normalizeName } from '../leaderboard/leaderboard';
import { mapKey } from '../terminal/keys';

type NameEntryProps = {
  difficulty: Difficulty;
  score: number;
  onSubmit: (name: string) => void;
  onSkip: () => void;
};

const ALPHANUMERIC = /^[a-z0-9]$/i;

function NameEntry({ difficulty, score, onSubmit, onSkip }: NameEntryProps) {
  const [name, setName] = useState('');

  useInput((input, key) => {
    const mapped = mapKey(input, key, 'text');
    if (!mapped) return;

    switch (mapped.type) {
      case 'quit':
        onSkip();
        break;
      case 'confirm':
        if (isValidName(name)) onSubmit(normalizeName(name));
        break;
      case 'backspace':
        setName((current) => current.slice(0, -1));
        break;
      case 'char':
        if (ALPHANUMERIC.test(mapped.value)) {
          setName((current) =>
            current.length < MAX_NAME_LENGTH ? current + mapped.value.toUpperCase() : current
          );
        }
        break;
      default:
        break;
    }
  });

  return (
    <Box flexDirection="column" alignItems="center" paddingY={1}>
      <Text bold color="yellow">
        NEW HIGH SCORE!
      </Text>
      <Text>
        {DIFFICULTY_SETTINGS[difficulty].label}: {score} points
      </Text>
      <Box marginTop={1}>
        <Text>Enter your name: </Text>
        <Text color="green">{name}</Text>
        <Text dimColor>_</Text>
      </Box>
      <Box marginTop={1}>
        <Text dimColor>
          Letters and digits, up to {MAX_NAME_LENGTH}. Enter to save, ESC to skip
        </Text>
      </Box>
    </Box>
  );
}

export default NameEntry;
