import type { GameState } from '../types';
import { ScenarioEngine, createScenarioState } from '../scenarioEngine';
import { createDice } from '../systems/dice';

/**
 * Creates a deterministic, empty GameState for testing purposes.
 */
export const createMockState = (width = 10, height = 10, overrides: Partial<GameState> = {}): GameState => {
    const state = createScenarioState(width, height, 'test-seed');
    return { ...state, ...overrides };
};

/**
 * Engine over an empty grid, ready for setup calls.
 */
export const createMockEngine = (width = 10, height = 10): ScenarioEngine =>
    new ScenarioEngine(createMockState(width, height));

/** Dice that always land on `value` and never draw from the RNG. */
export const fixed = (value: number) => createDice(0, 1, value);
