/**
 * ARCHITECTURE OVERVIEW
 * Logic: Immutable State + pure reducer (see gameReducer in logic.ts)
 * Entities: closed tagged union keyed by `kind`; enemy behavior is a policy
 * looked up by kind (systems/ai.ts), never a method on the entity.
 * Entropy: owned by the state (rngSeed + rngCounter), never global.
 */
export interface Point {
    x: number;
    y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Terminal color names understood by the renderer. Carried for presentation only. */
export type DisplayColor = 'gray' | 'magenta' | 'red' | 'green' | 'yellow';

export interface Dice {
    readonly count: number;
    readonly sides: number;
    readonly modifier: number;
}

interface ElementBase {
    id: string;
    position: Point;
    glyph: string;
    color: DisplayColor;
}

export interface Wall extends ElementBase {
    kind: 'wall';
}

export interface HealthPotion extends ElementBase {
    kind: 'potion';
    healAmount: number;
}

export type EnemyKind = 'rat' | 'snake';

interface ActorBase extends ElementBase {
    name: string;
    /** No storage floor: combat may drive this negative. */
    hp: number;
    attackDice: Dice;
    defenceDice: Dice;
}

export interface Player extends ActorBase {
    kind: 'player';
    maxHp: number;
}

export interface Enemy extends ActorBase {
    kind: EnemyKind;
}

export type Actor = Player | Enemy;

export type LevelElement = Wall | HealthPotion | Actor;

export type GameStatus = 'playing' | 'lost' | 'won' | 'quit';

export type Action =
    | { type: 'MOVE'; direction: Direction }
    | { type: 'WAIT' }
    | { type: 'QUIT' }
    | { type: 'LOAD_LEVEL'; source: string; seed?: string };

/** Actions that consume a turn and are recorded for replays. */
export type TurnAction = Extract<Action, { type: 'MOVE' | 'WAIT' }>;

export interface GameState {
    turn: number;
    player: Player;
    enemies: Enemy[];
    /** Keyed by pointToKey(position). Walls are never removed. */
    walls: Map<string, Wall>;
    potions: HealthPotion[];
    gridWidth: number;
    gridHeight: number;
    playerStart: Point;
    gameStatus: GameStatus;
    message: string[];
    kills: number;
    rngSeed: string;
    rngCounter: number;
    /** Wall keys seen at least once. Grows for the whole run. */
    discoveredWalls: Set<string>;
    actionLog: TurnAction[];
}

/** Everything the renderer needs for one pass. */
export interface Frame {
    width: number;
    height: number;
    turn: number;
    status: GameStatus;
    player: Player;
    walls: Wall[];
    enemies: Enemy[];
    potions: HealthPotion[];
    hp: number;
    maxHp: number;
    attackLabel: string;
    defenceLabel: string;
    kills: number;
    messages: string[];
}
