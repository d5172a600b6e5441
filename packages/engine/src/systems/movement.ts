import type { Action, GameState, Point } from '../types';
import { PLAYER_ID } from '../constants';
import { createPoint, directionVector, pointAdd, pointEquals } from '../grid';
import { getEnemyAt, getPotionAt, isInGrid, isWallAt } from '../helpers';
import { applyHeal } from './actor';
import { resolveMeleeExchange } from './combat';
import { appendTaggedMessage } from './engine-messages';

/**
 * Movement System
 * Bump-to-attack movement for the player and the shared enemy step rule.
 */

const actionDelta = (action: Action): Point =>
    action.type === 'MOVE' ? directionVector(action.direction) : createPoint(0, 0);

/**
 * Player turn. Out of bounds and walls are silent no-ops; an enemy on the
 * target tile is fought instead of entered.
 */
export const resolvePlayerMove = (state: GameState, action: Action): GameState => {
    const target = pointAdd(state.player.position, actionDelta(action));

    // 1. Bounds
    if (!isInGrid(state, target)) return state;

    // 2. Bump attack
    const enemy = getEnemyAt(state.enemies, target);
    if (enemy) {
        return resolveMeleeExchange(state, PLAYER_ID, enemy.id);
    }

    // 3. Walls
    if (isWallAt(state, target)) return state;

    // 4. Step, then pick up whatever is underfoot
    const moved: GameState = { ...state, player: { ...state.player, position: target } };
    return consumePotionAt(moved, target);
};

const consumePotionAt = (state: GameState, position: Point): GameState => {
    const potion = getPotionAt(state.potions, position);
    if (!potion) return state;

    const { player, healed } = applyHeal(state.player, potion.healAmount);
    return {
        ...state,
        player,
        potions: state.potions.filter(p => p.id !== potion.id),
        message: appendTaggedMessage(state.message, `You drink a health potion (+${healed} HP). HP: ${player.hp}`, 'INFO', 'PICKUP')
    };
};

/**
 * Shared enemy step rule. Walking into the player is an attack; every other
 * failure is silent.
 */
export const resolveEnemyMove = (state: GameState, enemyId: string, target: Point): GameState => {
    const enemy = state.enemies.find(e => e.id === enemyId);
    if (!enemy) return state;

    if (!isInGrid(state, target)) return state;

    if (pointEquals(state.player.position, target)) {
        return resolveMeleeExchange(state, enemyId, PLAYER_ID);
    }

    if (isWallAt(state, target)) return state;
    if (state.enemies.some(e => e.id !== enemyId && pointEquals(e.position, target))) return state;

    return {
        ...state,
        enemies: state.enemies.map(e => (e.id === enemyId ? { ...e, position: { ...target } } : e))
    };
};
