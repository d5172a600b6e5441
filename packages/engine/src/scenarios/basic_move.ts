import type { GameState } from '../types';
import type { ScenarioCollection } from './types';
import { createPoint, pointEquals } from '../grid';

/**
 * Basic Move Scenarios
 * Tests: stepping, walls, bounds and potion pickup.
 * A distant snake keeps the run from ending as "cleared"; snakes ignore a
 * player more than 2 tiles away.
 */
export const basicMoveScenarios: ScenarioCollection = {
    id: 'basic_move',
    name: 'Basic Move',
    description: 'Fundamental movement mechanics',

    scenarios: [
        {
            id: 'wall_blocks_step',
            title: 'Walls Hold',
            description: 'Walk into a wall, then walk away from it.',
            grid: { width: 10, height: 10 },
            category: 'movement',
            tags: ['movement', 'walls'],

            setup: (engine) => {
                engine.setPlayer(createPoint(2, 2));
                engine.setWall(createPoint(3, 2));
                engine.spawnEnemy('snake', createPoint(8, 8), 'anchor');
            },
            run: (engine) => {
                // Blocked by the wall, but still a turn
                engine.move('right');
                engine.move('up');
            },
            verify: (state: GameState, logs: string[]) => {
                const checks = {
                    positionCorrect: pointEquals(state.player.position, createPoint(2, 1)),
                    twoTurnsSpent: state.turn === 3 && state.actionLog.length === 2,
                    noCombat: !logs.some(l => l.includes('|COMBAT]'))
                };

                if (Object.values(checks).some(v => v === false)) {
                    console.log('Scenario Failed Details:', checks);
                }

                return Object.values(checks).every(v => v === true);
            }
        },
        {
            id: 'edge_of_the_map',
            title: 'Edge of the Map',
            description: 'Stepping off the grid does nothing, but the enemies still get their turn.',
            grid: { width: 5, height: 5 },
            category: 'movement',
            tags: ['movement', 'bounds'],

            setup: (engine) => {
                engine.setPlayer(createPoint(0, 0));
                engine.spawnEnemy('snake', createPoint(4, 4), 'anchor');
            },
            run: (engine) => {
                engine.move('left');
            },
            verify: (state: GameState) => {
                return pointEquals(state.player.position, createPoint(0, 0))
                    && state.turn === 2
                    // the snake drew its idle roll
                    && state.rngCounter === 1;
            }
        },
        {
            id: 'potion_tops_up',
            title: 'Quaff',
            description: 'A potion heals up to the HP cap and is used up.',
            grid: { width: 10, height: 10 },
            category: 'movement',
            tags: ['potion'],

            setup: (engine) => {
                engine.setPlayer(createPoint(2, 2), { hp: 95 });
                engine.placePotion(createPoint(3, 2));
                engine.spawnEnemy('snake', createPoint(8, 8), 'anchor');
            },
            run: (engine) => {
                engine.move('right');
            },
            verify: (state: GameState, logs: string[]) => {
                return state.player.hp === 100
                    && state.potions.length === 0
                    && logs.includes('[INFO|PICKUP] You drink a health potion (+5 HP). HP: 100');
            }
        }
    ]
};
