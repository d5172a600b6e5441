import React from 'react';
import { Box, Text } from 'ink';
import type { Frame } from '@lantern/engine';

interface EndScreenProps {
  frame: Frame;
}

export const EndScreen: React.FC<EndScreenProps> = ({ frame }) => {
  const won = frame.status === 'won';

  return (
    <Box flexDirection="column" borderStyle="double" borderColor={won ? 'green' : 'red'} paddingX={2}>
      <Text bold color={won ? 'green' : 'red'}>
        {won ? 'VICTORY' : 'GAME OVER'}
      </Text>
      <Text>
        {won ? 'The dungeon is clear.' : 'You died in the dark.'} Turns: {frame.turn - 1}, kills: {frame.kills}.
      </Text>
      <Text dimColor>Press any key to exit.</Text>
    </Box>
  );
};
