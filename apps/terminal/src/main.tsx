import React from 'react';
import { render } from 'ink';
import { isLevelLoadError, loadLevelFile } from '@lantern/engine';
import { App } from './App';
import { startBackgroundMusic } from './audio';
import { resolveConfig } from './config';

const main = async (): Promise<void> => {
  const config = resolveConfig();

  let levelSource: string;
  try {
    levelSource = loadLevelFile(config.levelPath);
  } catch (err) {
    if (isLevelLoadError(err)) {
      console.error(`[lantern] ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const music = startBackgroundMusic(config.musicPath);
  const instance = render(<App levelSource={levelSource} seed={config.seed} />);
  try {
    await instance.waitUntilExit();
  } finally {
    music.stop();
  }
};

main().catch((err: unknown) => {
  console.error('[lantern] Unexpected failure', err);
  process.exitCode = 1;
});
