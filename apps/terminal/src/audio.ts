import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';

/** What the loop needs from a spawned player process. */
export interface PlayerProcess {
  once(event: 'exit' | 'error', listener: (arg: unknown) => void): unknown;
  kill(): boolean;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;

export interface MusicOptions {
  spawnPlayer?: SpawnPlayer;
  fileExists?: (path: string) => boolean;
  platform?: NodeJS.Platform;
  onWarning?: (message: string) => void;
  now?: () => number;
}

export interface MusicHandle {
  readonly active: boolean;
  stop(): void;
}

/** A clean exit sooner than this means the track cannot be looped. */
export const MIN_TRACK_MS = 1000;

const defaultSpawn: SpawnPlayer = (command, args) => spawn(command, args, { stdio: 'ignore' });

export const playerCommandFor = (platform: NodeJS.Platform, trackPath: string): { command: string; args: string[] } => {
  if (platform === 'darwin') return { command: 'afplay', args: [trackPath] };
  if (platform === 'win32') {
    const quoted = trackPath.replace(/'/g, "''");
    return {
      command: 'powershell',
      args: ['-NoProfile', '-Command', `(New-Object Media.SoundPlayer '${quoted}').PlaySync()`]
    };
  }
  return { command: 'aplay', args: ['-q', trackPath] };
};

/**
 * Loops a track through the platform's command line player. A missing track
 * means no music; a player that fails is reported once and not restarted.
 */
export const startBackgroundMusic = (trackPath: string, options: MusicOptions = {}): MusicHandle => {
  const {
    spawnPlayer = defaultSpawn,
    fileExists = existsSync,
    platform = process.platform,
    onWarning = (message: string) => console.warn(`[lantern] ${message}`),
    now = Date.now
  } = options;

  let stopped = !fileExists(trackPath);
  let current: PlayerProcess | undefined;
  const { command, args } = playerCommandFor(platform, trackPath);

  const fail = (message: string) => {
    if (stopped) return;
    stopped = true;
    current = undefined;
    onWarning(message);
  };

  const play = () => {
    if (stopped) return;
    const proc = spawnPlayer(command, args);
    const startedAt = now();
    current = proc;
    proc.once('error', err => {
      fail(`Background music unavailable: ${err instanceof Error ? err.message : String(err)}`);
    });
    proc.once('exit', code => {
      if (stopped || current !== proc) return;
      if (code !== 0) {
        fail(`Background music player exited with code ${String(code)}`);
        return;
      }
      if (now() - startedAt < MIN_TRACK_MS) {
        fail('Background music track ended immediately; not looping it');
        return;
      }
      play();
    });
  };

  play();

  return {
    get active() {
      return !stopped;
    },
    stop() {
      if (stopped) return;
      stopped = true;
      current?.kill();
      current = undefined;
    }
  };
};
