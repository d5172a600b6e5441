import React from 'react';
import { Box, Text } from 'ink';
import type { Frame } from '@lantern/engine';

interface StatusPanelProps {
  frame: Frame;
}

export const StatusPanel: React.FC<StatusPanelProps> = ({ frame }) => {
  const hpColor = frame.hp <= frame.maxHp / 4 ? 'red' : 'green';

  return (
    <Box flexDirection="column">
      <Text>
        Turn {frame.turn}  <Text color={hpColor}>HP {frame.hp}/{frame.maxHp}</Text>  ATK {frame.attackLabel}  DEF {frame.defenceLabel}  Kills {frame.kills}
      </Text>
      <Text dimColor>arrows/WASD move, q quits</Text>
    </Box>
  );
};
