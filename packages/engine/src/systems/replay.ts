import type { Direction, GameState, TurnAction } from '../types';
import { gameReducer, generateInitialState } from '../logic';
import { CARDINAL_DIRECTIONS, pointEquals } from '../grid';

export const REPLAYABLE_ACTION_TYPES = new Set<string>([
    'MOVE',
    'WAIT'
]);

export interface ReplayActionValidationResult {
    valid: boolean;
    actions: TurnAction[];
    errors: string[];
}

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

const isDirection = (value: unknown): value is Direction =>
    typeof value === 'string' && CARDINAL_DIRECTIONS.some(d => d === value);

const toTurnAction = (candidate: Record<string, unknown>): TurnAction | undefined => {
    if (candidate.type === 'WAIT') return { type: 'WAIT' };
    if (candidate.type === 'MOVE' && isDirection(candidate.direction)) {
        return { type: 'MOVE', direction: candidate.direction };
    }
    return undefined;
};

export const validateReplayActions = (actions: unknown): ReplayActionValidationResult => {
    if (!Array.isArray(actions)) {
        return {
            valid: false,
            actions: [],
            errors: ['Replay actions must be an array.']
        };
    }

    const validActions: TurnAction[] = [];
    const errors: string[] = [];

    actions.forEach((candidate: unknown, index) => {
        if (!isObject(candidate) || typeof candidate.type !== 'string') {
            errors.push(`Action[${index}] is not a valid action object with a "type" field.`);
            return;
        }
        if (!REPLAYABLE_ACTION_TYPES.has(candidate.type)) {
            errors.push(`Action[${index}] type "${candidate.type}" is not replayable.`);
            return;
        }
        const action = toTurnAction(candidate);
        if (!action) {
            errors.push(`Action[${index}] has an invalid direction.`);
            return;
        }
        validActions.push(action);
    });

    return {
        valid: errors.length === 0,
        actions: validActions,
        errors
    };
};

/**
 * Re-runs a recorded run. Same level, seed and actions always give the same
 * state.
 */
export const replayRun = (source: string, seed: string, actions: TurnAction[]): GameState =>
    actions.reduce<GameState>((state, action) => gameReducer(state, action), generateInitialState(source, seed));

export interface ReplayVerification {
    ok: boolean;
    mismatches: string[];
}

export const verifyReplay = (state: GameState, source: string): ReplayVerification => {
    const replayed = replayRun(source, state.rngSeed, state.actionLog);
    const mismatches: string[] = [];

    if (!pointEquals(replayed.player.position, state.player.position)) mismatches.push('player_position');
    if (replayed.player.hp !== state.player.hp) mismatches.push('player_hp');
    if (replayed.kills !== state.kills) mismatches.push('kills');
    if (replayed.enemies.length !== state.enemies.length) mismatches.push('enemy_count');
    // Quitting is not a recorded action.
    if (state.gameStatus !== 'quit' && replayed.gameStatus !== state.gameStatus) mismatches.push('game_status');

    return { ok: mismatches.length === 0, mismatches };
};
