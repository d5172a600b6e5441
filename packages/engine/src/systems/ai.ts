/**
 * ENEMY AI SYSTEM
 * One pure policy per enemy kind. A policy only picks a destination; the
 * shared step rule in movement.ts decides what actually happens there.
 */
import type { Enemy, EnemyKind, GameState, Point } from '../types';
import { SNAKE_ALERT_RADIUS_SQUARED, SNAKE_SKIP_CHANCE } from '../constants';
import { CARDINAL_DIRECTIONS, directionVector, distanceSquared, getNeighbors, pointAdd } from '../grid';
import { isBlockedForEnemy } from '../helpers';
import { isDead } from './actor';
import { resolveEnemyMove } from './movement';
import { consumeRandom, toIntInRange } from './rng';

export type EnemyPlannerResult = { destination?: Point; nextState: GameState };
export type EnemyPolicyHandler = (enemy: Enemy, state: GameState) => EnemyPlannerResult;

/** Uniform random cardinal step. Walls and bounds are the step rule's problem. */
const ratPolicy: EnemyPolicyHandler = (enemy, state) => {
    const { value, nextState } = consumeRandom(state);
    const direction = CARDINAL_DIRECTIONS[toIntInRange(value, 0, CARDINAL_DIRECTIONS.length - 1)];
    return { destination: pointAdd(enemy.position, directionVector(direction)), nextState };
};

/**
 * Sometimes idles; otherwise, once the player is within 2 tiles, backs off to
 * the open neighbor farthest from the player. Stays put if nothing is farther.
 */
const snakePolicy: EnemyPolicyHandler = (enemy, state) => {
    const { value, nextState } = consumeRandom(state);
    if (value < SNAKE_SKIP_CHANCE) return { nextState };

    const playerPos = nextState.player.position;
    const current = distanceSquared(enemy.position, playerPos);
    if (current > SNAKE_ALERT_RADIUS_SQUARED) return { nextState };

    let best = current;
    let destination: Point | undefined;
    for (const candidate of getNeighbors(enemy.position)) {
        if (isBlockedForEnemy(nextState, candidate, enemy.id)) continue;
        const d2 = distanceSquared(candidate, playerPos);
        if (d2 > best) {
            best = d2;
            destination = candidate;
        }
    }

    return { destination, nextState };
};

export const ENEMY_POLICIES: Record<EnemyKind, EnemyPolicyHandler> = {
    rat: ratPolicy,
    snake: snakePolicy,
};

export const planEnemyStep = (enemy: Enemy, state: GameState): EnemyPlannerResult =>
    ENEMY_POLICIES[enemy.kind](enemy, state);

/**
 * Enemies phase. Iterates a snapshot of ids so enemies removed mid-phase
 * (killed by retaliation) never act.
 */
export const resolveEnemyTurn = (state: GameState): GameState => {
    const order = state.enemies.map(e => e.id);

    return order.reduce((curState, id) => {
        const enemy = curState.enemies.find(e => e.id === id);
        if (!enemy || isDead(enemy)) return curState;

        const { destination, nextState } = planEnemyStep(enemy, curState);
        if (!destination) return nextState;
        return resolveEnemyMove(nextState, id, destination);
    }, state);
};
