import type { GameState } from '../types';

export interface RandomSource {
    next: () => number;
}

// 1. Unified Hash Function (xfnv1a)
const hashStrToUint = (str: string): number => {
    let h = 2166136261 >>> 0;
    for (let i = 0; i < str.length; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, 16777619) >>> 0;
    }
    return h >>> 0;
};

// 2. Deterministic PRNG (Mulberry32)
const mulberry32 = (a: number) => {
    return function () {
        let t = (a += 0x6D2B79F5) >>> 0;
        t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61) >>> 0;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

/**
 * Creates a deterministic RNG instance. Values are in [0, 1).
 */
export const createRng = (seed: string | number): RandomSource => {
    const seedNum = typeof seed === 'number' ? (seed >>> 0) : hashStrToUint(String(seed));
    const rnd = mulberry32(seedNum || 1);

    return {
        next: () => rnd(),
    };
};

/**
 * Use this for stateless random checks.
 */
export const randomFromSeed = (seed: string | number, counter: number): number => {
    const s = `${seed}:${counter}`;
    return createRng(s).next();
};

/**
 * Maps a [0, 1) float onto an inclusive integer range.
 */
export const toIntInRange = (value: number, min: number, max: number): number => {
    const span = max - min + 1;
    return min + Math.min(span - 1, Math.floor(value * span));
};

/**
 * Consumes the next random value from the state's entropy pool.
 */
export const consumeRandom = (state: GameState): { value: number; nextState: GameState } => {
    const seed = state.rngSeed || 'default';
    const counter = state.rngCounter || 0;

    const value = randomFromSeed(seed, counter);

    return {
        value,
        nextState: {
            ...state,
            rngCounter: counter + 1
        }
    };
};

/**
 * Exposes the state's entropy pool as a RandomSource. Call `commit` to get the
 * state with the counter advanced past every value drawn.
 */
export const createStateRandomSource = (state: GameState): RandomSource & { commit: () => GameState } => {
    let cur = state;
    return {
        next: () => {
            const { value, nextState } = consumeRandom(cur);
            cur = nextState;
            return value;
        },
        commit: () => cur
    };
};
