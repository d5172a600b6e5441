import { describe, expect, it } from 'vitest';
import { resolveEnemyMove, resolvePlayerMove } from '../systems/movement';
import { createPoint } from '../grid';
import { createMockEngine, fixed } from './test_utils';

describe('player movement', () => {
    it('steps onto an open floor tile', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2));

        const next = resolvePlayerMove(engine.state, { type: 'MOVE', direction: 'up' });
        expect(next.player.position).toEqual({ x: 2, y: 1 });
        expect(next.message).toEqual([]);
    });

    it('returns the same state when walking into a wall', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2));
        engine.setWall(createPoint(3, 2));

        const state = engine.state;
        expect(resolvePlayerMove(state, { type: 'MOVE', direction: 'right' })).toBe(state);
    });

    it('returns the same state when walking off the grid', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(0, 4));

        const state = engine.state;
        expect(resolvePlayerMove(state, { type: 'MOVE', direction: 'left' })).toBe(state);
        expect(resolvePlayerMove(state, { type: 'MOVE', direction: 'down' })).toBe(state);
    });

    it('treats WAIT as a zero step', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2));

        const next = resolvePlayerMove(engine.state, { type: 'WAIT' });
        expect(next.player.position).toEqual({ x: 2, y: 2 });
    });

    it('attacks instead of moving when an enemy is in the way', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2), { attackDice: fixed(10), defenceDice: fixed(0) });
        engine.spawnEnemy('rat', createPoint(2, 3), 'rat_1', { defenceDice: fixed(0) });

        const next = resolvePlayerMove(engine.state, { type: 'MOVE', direction: 'down' });
        expect(next.player.position).toEqual({ x: 2, y: 2 });
        expect(next.enemies).toHaveLength(0);
        expect(next.kills).toBe(1);
    });

    it.each([
        [100, 0, 100],
        [95, 5, 100],
        [50, 10, 60],
    ])('drinks a potion at %i HP for +%i', (prior, healed, after) => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(1, 1), { hp: prior });
        engine.placePotion(createPoint(2, 1));

        const next = resolvePlayerMove(engine.state, { type: 'MOVE', direction: 'right' });
        expect(next.player.hp).toBe(after);
        expect(next.potions).toHaveLength(0);
        expect(next.message).toEqual([`[INFO|PICKUP] You drink a health potion (+${healed} HP). HP: ${after}`]);
    });

    it('consumes only the potion underfoot', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(1, 1), { hp: 50 });
        engine.placePotion(createPoint(2, 1));
        engine.placePotion(createPoint(3, 1));

        const next = resolvePlayerMove(engine.state, { type: 'MOVE', direction: 'right' });
        expect(next.potions.map(p => p.position)).toEqual([{ x: 3, y: 1 }]);
    });
});

describe('enemy step rule', () => {
    it('moves onto free floor', () => {
        const engine = createMockEngine(5, 5);
        engine.spawnEnemy('rat', createPoint(3, 3), 'rat_1');

        const next = resolveEnemyMove(engine.state, 'rat_1', createPoint(3, 4));
        expect(next.enemies[0].position).toEqual({ x: 3, y: 4 });
        expect(next.rngCounter).toBe(0);
    });

    it('is blocked by walls, other enemies and the grid edge', () => {
        const engine = createMockEngine(5, 5);
        engine.spawnEnemy('rat', createPoint(4, 4), 'rat_1');
        engine.spawnEnemy('snake', createPoint(3, 4), 'snake_1');
        engine.setWall(createPoint(4, 3));

        const state = engine.state;
        expect(resolveEnemyMove(state, 'rat_1', createPoint(3, 4))).toBe(state);
        expect(resolveEnemyMove(state, 'rat_1', createPoint(4, 3))).toBe(state);
        expect(resolveEnemyMove(state, 'rat_1', createPoint(5, 4))).toBe(state);
    });

    it('attacks the player instead of entering their tile', () => {
        const engine = createMockEngine(5, 5);
        engine.setPlayer(createPoint(2, 2), { attackDice: fixed(0), defenceDice: fixed(0) });
        engine.spawnEnemy('rat', createPoint(2, 3), 'rat_1', { attackDice: fixed(4), defenceDice: fixed(0) });

        const next = resolveEnemyMove(engine.state, 'rat_1', createPoint(2, 2));
        expect(next.enemies[0].position).toEqual({ x: 2, y: 3 });
        expect(next.player.hp).toBe(96);
        expect(next.message[0]).toBe('[INFO|COMBAT] Rat attacks Player: 0d1+4 rolled 4 vs 0d1+0 rolled 0. Hit for 4 damage! Player HP: 96');
    });

    it('ignores unknown enemies', () => {
        const engine = createMockEngine(5, 5);
        const state = engine.state;
        expect(resolveEnemyMove(state, 'rat_9', createPoint(1, 1))).toBe(state);
    });
});
