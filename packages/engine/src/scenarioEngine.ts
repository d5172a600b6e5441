import type { Action, Dice, Direction, EnemyKind, GameState, Point } from './types';
import { gameReducer } from './logic';
import { createPoint, pointToKey } from './grid';
import { createEnemy, createPlayer, createPotion, createWall } from './systems/entity-factory';
import { discoverWalls } from './systems/visibility';
import { newLogLines } from './systems/engine-messages';

/**
 * Blank, wall-less level with the player at the origin and no enemies.
 */
export const createScenarioState = (width: number, height: number, seed = 'scenario-seed'): GameState => ({
    turn: 1,
    player: createPlayer({ position: createPoint(0, 0) }),
    enemies: [],
    walls: new Map(),
    potions: [],
    gridWidth: width,
    gridHeight: height,
    playerStart: createPoint(0, 0),
    gameStatus: 'playing',
    message: [],
    kills: 0,
    rngSeed: seed,
    rngCounter: 0,
    discoveredWalls: new Set<string>(),
    actionLog: [],
});

export interface ActorOverrides {
    hp?: number;
    attackDice?: Dice;
    defenceDice?: Dice;
}

/**
 * Headless engine wrapper for scripted scenarios. Setup helpers mutate the
 * wrapped state directly; turns go through gameReducer.
 */
export class ScenarioEngine {
    state: GameState;
    logs: string[] = [];

    constructor(initialState: GameState) {
        this.state = initialState;
    }

    setPlayer(pos: Point, overrides: ActorOverrides = {}) {
        this.state.player = createPlayer({ position: pos, ...overrides });
        this.state.playerStart = { ...pos };
    }

    spawnEnemy(kind: EnemyKind, pos: Point, id: string, overrides: ActorOverrides = {}) {
        this.state.enemies.push(createEnemy({ id, kind, position: pos, ...overrides }));
    }

    setWall(pos: Point) {
        this.state.walls.set(pointToKey(pos), createWall(pos));
    }

    /** Walls along the outer edge of the grid. */
    encloseGrid() {
        const { gridWidth: w, gridHeight: h } = this.state;
        for (let x = 0; x < w; x++) {
            this.setWall(createPoint(x, 0));
            this.setWall(createPoint(x, h - 1));
        }
        for (let y = 1; y < h - 1; y++) {
            this.setWall(createPoint(0, y));
            this.setWall(createPoint(w - 1, y));
        }
    }

    placePotion(pos: Point, healAmount?: number) {
        this.state.potions.push(createPotion(pos, healAmount));
    }

    /** Mirrors the first render pass of a loaded level. */
    reveal() {
        this.state = discoverWalls(this.state);
    }

    dispatch(action: Action): GameState {
        const before = this.state.message;
        this.state = gameReducer(this.state, action);
        this.logs.push(...newLogLines(before, this.state.message));
        return this.state;
    }

    move(direction: Direction): GameState {
        return this.dispatch({ type: 'MOVE', direction });
    }

    wait(): GameState {
        return this.dispatch({ type: 'WAIT' });
    }

    getEnemy(id: string) {
        return this.state.enemies.find(e => e.id === id);
    }
}
