/**
 * STATELESS HELPERS
 * Pure utility functions for grid and entity queries.
 */
import type { Actor, Enemy, GameState, HealthPotion, Point } from './types';
import { PLAYER_ID } from './constants';
import { isInBounds, pointEquals, pointToKey } from './grid';

export const isWallAt = (state: GameState, position: Point): boolean =>
    state.walls.has(pointToKey(position));

export const getEnemyAt = (
    enemies: Enemy[],
    position: Point
): Enemy | undefined => enemies.find(e => pointEquals(e.position, position));

export const getPotionAt = (
    potions: HealthPotion[],
    position: Point
): HealthPotion | undefined => potions.find(p => pointEquals(p.position, position));

export const getActorById = (state: GameState, id: string): Actor | undefined => {
    if (id === PLAYER_ID) return state.player;
    return state.enemies.find(e => e.id === id);
};

export const isInGrid = (state: GameState, position: Point): boolean =>
    isInBounds(position, state.gridWidth, state.gridHeight);

/**
 * Movement blocking from an enemy's point of view: walls, other enemies and
 * the player's tile. The player's tile still counts as an attack target.
 */
export const isBlockedForEnemy = (state: GameState, position: Point, selfId: string): boolean => {
    if (isWallAt(state, position)) return true;
    if (pointEquals(state.player.position, position)) return true;
    return state.enemies.some(e => e.id !== selfId && pointEquals(e.position, position));
};

/**
 * Replaces an actor (player or enemy) by id.
 */
export const updateActor = (state: GameState, actor: Actor): GameState => {
    if (actor.kind === 'player') {
        return { ...state, player: actor };
    }
    return {
        ...state,
        enemies: state.enemies.map(e => (e.id === actor.id ? actor : e))
    };
};
