import React from 'react';
import { Box, Text } from 'ink';
import type { Frame } from '@lantern/engine';
import { frameToRows } from '../render-rows';

interface MapViewProps {
  frame: Frame;
}

export const MapView: React.FC<MapViewProps> = ({ frame }) => {
  const rows = React.useMemo(() => frameToRows(frame), [frame]);

  return (
    <Box flexDirection="column">
      {rows.map((runs, y) => (
        <Text key={y}>
          {runs.map((run, i) => (
            <Text key={i} color={run.color}>{run.text}</Text>
          ))}
        </Text>
      ))}
    </Box>
  );
};
