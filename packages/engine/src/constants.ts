/**
 * GAME CONSTANTS
 * Central repository for stats, glyphs and rule tuning.
 */
import type { DisplayColor, EnemyKind } from './types';

export const PLAYER_ID = 'player';

export const INITIAL_PLAYER_STATS = {
    name: 'Player',
    hp: 100,
    maxHp: 100,
    attack: { count: 2, sides: 6, modifier: 2 },
    defence: { count: 2, sides: 6, modifier: 0 },
};

export const ENEMY_STATS: Record<EnemyKind, {
    name: string;
    hp: number;
    attack: { count: number; sides: number; modifier: number };
    defence: { count: number; sides: number; modifier: number };
}> = {
    rat: {
        name: 'Rat',
        hp: 5,
        attack: { count: 1, sides: 6, modifier: 3 },
        defence: { count: 1, sides: 6, modifier: 1 },
    },
    snake: {
        name: 'Snake',
        hp: 5,
        attack: { count: 3, sides: 4, modifier: 2 },
        defence: { count: 1, sides: 8, modifier: 5 },
    },
};

export const POTION_HEAL_AMOUNT = 10;

// Level glyphs
export const GLYPHS = {
    wall: '#',
    rat: 'r',
    snake: 's',
    player: '@',
    potion: 'K',
} as const;

export const COLORS: Record<'wall' | 'potion' | 'player' | EnemyKind, DisplayColor> = {
    wall: 'gray',
    potion: 'magenta',
    player: 'yellow',
    rat: 'red',
    snake: 'green',
};

/** Radius 5, compared squared. */
export const SIGHT_RADIUS_SQUARED = 25;

export const SNAKE_SKIP_CHANCE = 0.15;
/** Snakes ignore the player beyond 2 tiles. */
export const SNAKE_ALERT_RADIUS_SQUARED = 4;

export const MESSAGE_LOG_LIMIT = 50;
