import type { GameState } from '../types';
import type { ScenarioEngine } from '../scenarioEngine';

/**
 * Scripted behavior check, doubling as a plain-language rules example.
 */
export interface TestScenario {
    /** Unique ID (e.g., "wall_blocks_step") */
    id: string;
    title: string;
    description: string;
    /** Grid size the runner builds before setup. */
    grid: { width: number; height: number };
    /** Category for grouping scenarios (e.g., 'combat', 'movement', 'ai') */
    category?: string;
    tags?: string[];
    setup: (engine: ScenarioEngine) => void;
    run: (engine: ScenarioEngine) => void;
    verify: (state: GameState, logs: string[]) => boolean;
}

/**
 * Scenario collection organized by category
 */
export interface ScenarioCollection {
    id: string;
    name: string;
    description: string;
    scenarios: TestScenario[];
}
