import type { GameState } from '../types';
import type { ScenarioCollection } from './types';
import { createPoint, pointEquals } from '../grid';

/**
 * Enemy AI Scenarios
 * Tests: snake alert radius, snake retreat, rats boxed in by walls.
 */
export const enemyAiScenarios: ScenarioCollection = {
    id: 'enemy_ai',
    name: 'Enemy AI',
    description: 'Per-kind movement policies',

    scenarios: [
        {
            id: 'snake_ignores_distant_player',
            title: 'Out of Reach',
            description: 'A snake three tiles away does not react.',
            grid: { width: 10, height: 10 },
            category: 'ai',
            tags: ['snake'],

            setup: (engine) => {
                engine.setPlayer(createPoint(1, 1));
                engine.spawnEnemy('snake', createPoint(4, 1), 'snake_1');
            },
            run: (engine) => {
                engine.wait();
                engine.wait();
                engine.wait();
            },
            verify: (state: GameState) => {
                const snake = state.enemies.find(e => e.id === 'snake_1');
                return !!snake && pointEquals(snake.position, createPoint(4, 1));
            }
        },
        {
            id: 'snake_backs_off',
            title: 'Keep Your Distance',
            description: 'A snake next to the player slides to the open tile farthest away, unless it idles.',
            grid: { width: 10, height: 10 },
            category: 'ai',
            tags: ['snake'],

            setup: (engine) => {
                engine.setPlayer(createPoint(2, 2));
                engine.spawnEnemy('snake', createPoint(3, 2), 'snake_1');
            },
            run: (engine) => {
                engine.wait();
            },
            verify: (state: GameState, logs: string[]) => {
                const snake = state.enemies.find(e => e.id === 'snake_1');
                if (!snake) return false;
                const idled = pointEquals(snake.position, createPoint(3, 2));
                const retreated = pointEquals(snake.position, createPoint(4, 2));
                // The player's tile is never chosen, so the snake never attacks here.
                return (idled || retreated)
                    && state.player.hp === 100
                    && !logs.some(l => l.includes('Snake attacks'));
            }
        },
        {
            id: 'rat_boxed_in',
            title: 'Cornered Rat',
            description: 'A rat surrounded by walls tries to move every turn and never gets anywhere.',
            grid: { width: 7, height: 7 },
            category: 'ai',
            tags: ['rat', 'walls'],

            setup: (engine) => {
                engine.encloseGrid();
                engine.setWall(createPoint(2, 1));
                engine.setWall(createPoint(1, 2));
                engine.setPlayer(createPoint(4, 4));
                engine.spawnEnemy('rat', createPoint(1, 1), 'rat_1');
            },
            run: (engine) => {
                for (let i = 0; i < 5; i++) engine.wait();
            },
            verify: (state: GameState) => {
                const rat = state.enemies.find(e => e.id === 'rat_1');
                return !!rat
                    && pointEquals(rat.position, createPoint(1, 1))
                    && state.rngCounter === 5
                    && state.player.hp === 100;
            }
        }
    ]
};
