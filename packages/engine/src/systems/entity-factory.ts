import type { Dice, Enemy, EnemyKind, HealthPotion, Player, Point, Wall } from '../types';
import { COLORS, ENEMY_STATS, GLYPHS, INITIAL_PLAYER_STATS, PLAYER_ID, POTION_HEAL_AMOUNT } from '../constants';
import { pointToKey } from '../grid';
import { createDice } from './dice';

/**
 * ENTITY FACTORY SYSTEM
 *
 * All level elements are created through these factories so that stats,
 * glyphs and colors come from one table (constants.ts).
 */

const toDice = (stats: { count: number; sides: number; modifier: number }): Dice =>
    createDice(stats.count, stats.sides, stats.modifier);

export interface PlayerConfig {
    position: Point;
    hp?: number;
    attackDice?: Dice;
    defenceDice?: Dice;
}

export const createPlayer = (config: PlayerConfig): Player => ({
    id: PLAYER_ID,
    kind: 'player',
    name: INITIAL_PLAYER_STATS.name,
    position: { ...config.position },
    glyph: GLYPHS.player,
    color: COLORS.player,
    hp: config.hp ?? INITIAL_PLAYER_STATS.hp,
    maxHp: INITIAL_PLAYER_STATS.maxHp,
    attackDice: config.attackDice ?? toDice(INITIAL_PLAYER_STATS.attack),
    defenceDice: config.defenceDice ?? toDice(INITIAL_PLAYER_STATS.defence),
});

export interface EnemyConfig {
    id: string;
    kind: EnemyKind;
    position: Point;
    hp?: number;
    attackDice?: Dice;
    defenceDice?: Dice;
}

/** Stats are fixed per kind; only explicit overrides change them. */
export const createEnemy = (config: EnemyConfig): Enemy => {
    const stats = ENEMY_STATS[config.kind];
    return {
        id: config.id,
        kind: config.kind,
        name: stats.name,
        position: { ...config.position },
        glyph: GLYPHS[config.kind],
        color: COLORS[config.kind],
        hp: config.hp ?? stats.hp,
        attackDice: config.attackDice ?? toDice(stats.attack),
        defenceDice: config.defenceDice ?? toDice(stats.defence),
    };
};

export const createWall = (position: Point): Wall => ({
    id: `wall_${pointToKey(position)}`,
    kind: 'wall',
    position: { ...position },
    glyph: GLYPHS.wall,
    color: COLORS.wall,
});

export const createPotion = (position: Point, healAmount: number = POTION_HEAL_AMOUNT): HealthPotion => ({
    id: `potion_${pointToKey(position)}`,
    kind: 'potion',
    position: { ...position },
    glyph: GLYPHS.potion,
    color: COLORS.potion,
    healAmount,
});
