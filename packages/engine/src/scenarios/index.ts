import type { TestScenario, ScenarioCollection } from './types';
import { basicMoveScenarios } from './basic_move';
import { basicAttackScenarios } from './basic_attack';
import { enemyAiScenarios } from './enemy_ai';

/**
 * Central registry for all test scenarios
 */
export const SCENARIO_COLLECTIONS: ScenarioCollection[] = [
    basicMoveScenarios,
    basicAttackScenarios,
    enemyAiScenarios,
];

export type { TestScenario, ScenarioCollection };
