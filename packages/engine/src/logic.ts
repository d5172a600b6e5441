/**
 * CORE ENGINE LOGIC
 * Immutable state, one reducer. generateInitialState and gameReducer are the
 * primary entry points.
 */
import type { Action, GameState, TurnAction } from './types';
import { createPoint } from './grid';
import { isDead } from './systems/actor';
import { resolveEnemyTurn } from './systems/ai';
import { createPlayer } from './systems/entity-factory';
import { appendTaggedMessage } from './systems/engine-messages';
import { parseLevel } from './systems/level';
import { resolvePlayerMove } from './systems/movement';
import { discoverWalls } from './systems/visibility';

/**
 * Fresh run from level text. Loading the same text twice gives equivalent
 * states.
 */
export const generateInitialState = (source: string, seed?: string): GameState => {
    // Callers should pass a seed; the clock keeps ad-hoc runs varied.
    const actualSeed = seed || String(Date.now());
    const level = parseLevel(source);
    const start = level.playerStart ?? createPoint(0, 0);

    let message = appendTaggedMessage([], 'You enter the dungeon. Clear it of vermin.');
    if (!level.playerStart) {
        message = appendTaggedMessage(message, 'Level has no player start (@); starting at the origin.', 'CRITICAL', 'SYSTEM');
    }

    const initialState: GameState = {
        turn: 1,
        player: createPlayer({ position: start }),
        enemies: level.enemies,
        walls: level.walls,
        potions: level.potions,
        gridWidth: level.width,
        gridHeight: level.height,
        playerStart: start,
        gameStatus: 'playing',
        message,
        kills: 0,
        rngSeed: actualSeed,
        rngCounter: 0,
        discoveredWalls: new Set<string>(),
        actionLog: [],
    };

    return resolveRunStatus(discoverWalls(initialState));
};

/**
 * Terminal checks, in order: death first, then a cleared level.
 */
export const resolveRunStatus = (state: GameState): GameState => {
    if (state.gameStatus !== 'playing') return state;

    if (isDead(state.player)) {
        return {
            ...state,
            gameStatus: 'lost',
            message: appendTaggedMessage(state.message, 'You died. Game over.', 'CRITICAL', 'SYSTEM')
        };
    }

    if (state.enemies.length === 0) {
        return {
            ...state,
            gameStatus: 'won',
            message: appendTaggedMessage(state.message, 'Every enemy is defeated. You win!', 'INFO', 'SYSTEM')
        };
    }

    return state;
};

/**
 * One full turn: the player's action, then every live enemy.
 */
export const resolveTurn = (state: GameState, action: TurnAction): GameState => {
    let curState: GameState = { ...state, actionLog: [...state.actionLog, action] };

    curState = resolvePlayerMove(curState, action);
    curState = resolveEnemyTurn(curState);
    curState = { ...curState, turn: curState.turn + 1 };

    return resolveRunStatus(discoverWalls(curState));
};

export const gameReducer = (state: GameState, action: Action): GameState => {
    if (action.type === 'LOAD_LEVEL') {
        return generateInitialState(action.source, action.seed ?? state.rngSeed);
    }

    // A finished run ignores input; a state that became terminal outside the
    // reducer is settled here before anything else happens.
    const settled = resolveRunStatus(state);
    if (settled.gameStatus !== 'playing') return settled;

    switch (action.type) {
        case 'QUIT':
            return { ...settled, gameStatus: 'quit' };
        case 'MOVE':
        case 'WAIT':
            return resolveTurn(settled, action);
    }
};
