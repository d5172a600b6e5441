import { describe, expect, it } from 'vitest';
import { createPoint } from '../grid';
import { MESSAGE_LOG_LIMIT } from '../constants';
import { newLogLines } from '../systems/engine-messages';
import { createMockEngine, fixed } from './test_utils';

describe('newLogLines', () => {
    it('returns the tail appended to an uncapped log', () => {
        expect(newLogLines(['a', 'b'], ['a', 'b', 'c', 'd'])).toEqual(['c', 'd']);
        expect(newLogLines([], ['a'])).toEqual(['a']);
        expect(newLogLines(['a'], ['a'])).toEqual([]);
    });

    it('accounts for lines dropped from the front of a capped log', () => {
        expect(newLogLines(['a', 'b', 'c'], ['b', 'c', 'd'])).toEqual(['d']);
        expect(newLogLines(['a', 'b', 'c'], ['c', 'd', 'e'])).toEqual(['d', 'e']);
    });

    it('treats a replaced log as entirely new', () => {
        expect(newLogLines(['a', 'b'], ['x', 'y'])).toEqual(['x', 'y']);
    });
});

describe('ScenarioEngine logs', () => {
    it('keeps recording once the state log is full', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2), { attackDice: fixed(0), defenceDice: fixed(50) });
        engine.spawnEnemy('rat', createPoint(3, 2), 'rat_1', { attackDice: fixed(0), defenceDice: fixed(0) });
        engine.state.message = Array.from({ length: MESSAGE_LOG_LIMIT }, (_, i) => `[INFO|SYSTEM] filler ${i}`);

        engine.move('right');

        expect(engine.state.message).toHaveLength(MESSAGE_LOG_LIMIT);
        expect(engine.logs[0]).toBe('[INFO|COMBAT] Player attacks Rat: 0d1+0 rolled 0 vs 0d1+0 rolled 0. Blocked! Rat HP: 5');
        expect(engine.logs[1]).toBe('[INFO|COMBAT] Rat attacks Player: 0d1+0 rolled 0 vs 0d1+50 rolled 50. Blocked! Player HP: 100');
        expect(engine.state.message.slice(-engine.logs.length)).toEqual(engine.logs);
    });
});
