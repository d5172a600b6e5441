/**
 * FOG OF WAR
 * Walls, once seen, stay on the map. Enemies and potions only show while they
 * are inside the sight radius.
 */
import type { Frame, GameState, Point, Wall } from '../types';
import { SIGHT_RADIUS_SQUARED } from '../constants';
import { distanceSquared, pointToKey } from '../grid';
import { displayHp } from './actor';
import { formatDice } from './dice';

export const isWithinSight = (origin: Point, target: Point): boolean =>
    distanceSquared(origin, target) <= SIGHT_RADIUS_SQUARED;

const wallsInSight = (state: GameState): Wall[] => {
    const origin = state.player.position;
    return [...state.walls.values()].filter(w => isWithinSight(origin, w.position));
};

/**
 * Adds every wall currently in sight to the discovered set. Returns the same
 * state when nothing new was seen.
 */
export const discoverWalls = (state: GameState): GameState => {
    const fresh = wallsInSight(state)
        .map(w => pointToKey(w.position))
        .filter(key => !state.discoveredWalls.has(key));
    if (fresh.length === 0) return state;

    return {
        ...state,
        discoveredWalls: new Set([...state.discoveredWalls, ...fresh])
    };
};

/**
 * Snapshot for one render pass.
 */
export const buildFrame = (state: GameState): Frame => {
    const origin = state.player.position;
    const walls = [...state.walls.values()].filter(w =>
        state.discoveredWalls.has(pointToKey(w.position)) || isWithinSight(origin, w.position)
    );

    return {
        width: state.gridWidth,
        height: state.gridHeight,
        turn: state.turn,
        status: state.gameStatus,
        player: state.player,
        walls,
        enemies: state.enemies.filter(e => isWithinSight(origin, e.position)),
        potions: state.potions.filter(p => isWithinSight(origin, p.position)),
        hp: displayHp(state.player),
        maxHp: state.player.maxHp,
        attackLabel: formatDice(state.player.attackDice),
        defenceLabel: formatDice(state.player.defenceDice),
        kills: state.kills,
        messages: state.message,
    };
};
