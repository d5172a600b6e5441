export * from './types';
export * from './grid';
export * from './logic';
export * from './constants';
export * from './helpers';

// Systems
export * from './systems/rng';
export * from './systems/dice';
export * from './systems/actor';
export * from './systems/entity-factory';
export * from './systems/level';
export * from './systems/level-file';
export * from './systems/errors';
export * from './systems/combat';
export * from './systems/movement';
export * from './systems/ai';
export * from './systems/visibility';
export * from './systems/engine-messages';
export * from './systems/replay';

// Headless scenarios
export * from './scenarioEngine';
export * from './scenarios';
