import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../config';

describe('resolveConfig', () => {
  it('prefers positional arguments over the environment', () => {
    const config = resolveConfig(['custom.txt', 'seed-a'], { LANTERN_LEVEL: 'env.txt', LANTERN_SEED: 'seed-b' });
    expect(config.levelPath).toBe('custom.txt');
    expect(config.seed).toBe('seed-a');
  });

  it('reads the environment when arguments are missing', () => {
    const config = resolveConfig([], { LANTERN_LEVEL: 'env.txt', LANTERN_SEED: 'seed-b', LANTERN_MUSIC: 'song.wav' });
    expect(config).toEqual({ levelPath: 'env.txt', seed: 'seed-b', musicPath: 'song.wav' });
  });

  it('falls back to bundled assets and the clock', () => {
    const config = resolveConfig([], { LANTERN_SEED: '' }, () => 1234);
    expect(config.seed).toBe('1234');
    expect(config.levelPath.endsWith('levels/level1.txt')).toBe(true);
    expect(config.musicPath.endsWith('assets/theme.wav')).toBe(true);
  });
});
