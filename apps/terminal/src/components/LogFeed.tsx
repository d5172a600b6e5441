import React from 'react';
import { Box, Text } from 'ink';
import { classifyMessage, type ClassifiedLog } from '../log-classifier';

interface LogFeedProps {
  messages: string[];
  limit?: number;
}

const entryColor = (entry: ClassifiedLog): string | undefined => {
  if (entry.level === 'critical') return 'red';
  if (entry.channel === 'pickup') return 'magenta';
  if (entry.channel === 'combat') return 'white';
  return undefined;
};

export const LogFeed: React.FC<LogFeedProps> = ({ messages, limit = 6 }) => {
  const recent = React.useMemo(
    () => messages.map((m, i) => classifyMessage(m, i)).slice(-limit),
    [messages, limit]
  );

  if (recent.length === 0) return null;

  return (
    <Box flexDirection="column" borderStyle="single" paddingX={1}>
      {recent.map(entry => (
        <Text key={entry.idx} color={entryColor(entry)} dimColor={entry.channel === 'system' && entry.level === 'info'}>
          {entry.text}
        </Text>
      ))}
    </Box>
  );
};
