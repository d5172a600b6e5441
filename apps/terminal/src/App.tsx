import React, { useEffect, useMemo, useReducer } from 'react';
import { Box, useApp, useInput } from 'ink';
import { buildFrame, gameReducer, generateInitialState } from '@lantern/engine';
import { MapView } from './components/MapView';
import { StatusPanel } from './components/StatusPanel';
import { LogFeed } from './components/LogFeed';
import { EndScreen } from './components/EndScreen';
import { keyToAction } from './input';

interface AppProps {
  levelSource: string;
  seed: string;
}

export const App: React.FC<AppProps> = ({ levelSource, seed }) => {
  const { exit } = useApp();
  const [gameState, dispatch] = useReducer(gameReducer, null, () => generateInitialState(levelSource, seed));
  const frame = useMemo(() => buildFrame(gameState), [gameState]);

  const finished = gameState.gameStatus === 'won' || gameState.gameStatus === 'lost';

  useEffect(() => {
    if (gameState.gameStatus === 'quit') exit();
  }, [gameState.gameStatus, exit]);

  useInput((input, key) => {
    if (finished) {
      exit();
      return;
    }
    dispatch(keyToAction(input, key));
  }, { isActive: gameState.gameStatus !== 'quit' });

  return (
    <Box flexDirection="column">
      <MapView frame={frame} />
      <StatusPanel frame={frame} />
      <LogFeed messages={frame.messages} />
      {finished && <EndScreen frame={frame} />}
    </Box>
  );
};
