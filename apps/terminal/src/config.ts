import { fileURLToPath } from 'node:url';

export interface TerminalConfig {
  levelPath: string;
  seed: string;
  musicPath: string;
}

const DEFAULT_LEVEL_PATH = fileURLToPath(new URL('../levels/level1.txt', import.meta.url));
const DEFAULT_MUSIC_PATH = fileURLToPath(new URL('../assets/theme.wav', import.meta.url));

const firstSet = (...values: Array<string | undefined>): string | undefined =>
  values.find(v => v !== undefined && v.trim() !== '');

/**
 * Positional arguments win over environment variables; an empty value counts
 * as unset.
 */
export const resolveConfig = (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  now: () => number = Date.now
): TerminalConfig => ({
  levelPath: firstSet(argv[0], env.LANTERN_LEVEL) ?? DEFAULT_LEVEL_PATH,
  seed: firstSet(argv[1], env.LANTERN_SEED) ?? String(now()),
  musicPath: firstSet(env.LANTERN_MUSIC) ?? DEFAULT_MUSIC_PATH,
});
