import type { Dice, GameState } from '../types';
import { createStateRandomSource, toIntInRange, type RandomSource } from './rng';

/**
 * Build a dice configuration. Out-of-range counts and sides are clamped
 * (count >= 0, sides >= 1), never rejected.
 */
export const createDice = (count: number, sides: number, modifier: number): Dice => ({
    count: Math.max(0, Math.trunc(count)),
    sides: Math.max(1, Math.trunc(sides)),
    modifier: Math.trunc(modifier),
});

/**
 * Sum of `count` uniform draws in [1, sides] plus the modifier.
 * Zero dice draw nothing and return the modifier.
 */
export const throwDice = (dice: Dice, rng: RandomSource): number => {
    let sum = 0;
    for (let i = 0; i < dice.count; i++) {
        sum += toIntInRange(rng.next(), 1, dice.sides);
    }
    return sum + dice.modifier;
};

/** Throw against the state's entropy pool. */
export const rollDice = (state: GameState, dice: Dice): { value: number; nextState: GameState } => {
    const source = createStateRandomSource(state);
    const value = throwDice(dice, source);
    return { value, nextState: source.commit() };
};

export const diceRange = (dice: Dice): { min: number; max: number } => ({
    min: dice.count + dice.modifier,
    max: dice.count * dice.sides + dice.modifier,
});

/** e.g. `2d6+2`, `1d4-1`, `0d1+7` */
export const formatDice = (dice: Dice): string =>
    `${dice.count}d${dice.sides}${dice.modifier >= 0 ? '+' : ''}${dice.modifier}`;
