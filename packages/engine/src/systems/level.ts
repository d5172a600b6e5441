/**
 * LEVEL PARSER
 * Turns the text grid into walls, enemies, potions, a player start and bounds.
 * Anything it does not recognize is floor. Ragged rows are legal.
 */
import type { Enemy, EnemyKind, HealthPotion, Point, Wall } from '../types';
import { GLYPHS } from '../constants';
import { createPoint, pointToKey } from '../grid';
import { createEnemy, createPotion, createWall } from './entity-factory';

export interface LevelData {
    walls: Map<string, Wall>;
    enemies: Enemy[];
    potions: HealthPotion[];
    /** Undefined when the source has no `@`. */
    playerStart?: Point;
    width: number;
    height: number;
}

/**
 * Splits on CRLF, CR or LF. A trailing line break does not add an empty row.
 */
export const splitLevelRows = (source: string): string[] => {
    if (source.length === 0) return [];
    const rows = source.split(/\r\n|\r|\n/);
    if (rows[rows.length - 1] === '') rows.pop();
    return rows;
};

const ENEMY_GLYPHS = new Map<string, EnemyKind>([
    [GLYPHS.rat, 'rat'],
    [GLYPHS.snake, 'snake'],
]);

export const parseLevel = (source: string): LevelData => {
    const rows = splitLevelRows(source);
    const walls = new Map<string, Wall>();
    const enemies: Enemy[] = [];
    const potions: HealthPotion[] = [];
    const enemyCounts: Record<EnemyKind, number> = { rat: 0, snake: 0 };
    let playerStart: Point | undefined;

    rows.forEach((row, y) => {
        for (let x = 0; x < row.length; x++) {
            const glyph = row[x];
            const position = createPoint(x, y);
            const enemyKind = ENEMY_GLYPHS.get(glyph);

            if (glyph === GLYPHS.wall) {
                walls.set(pointToKey(position), createWall(position));
            } else if (glyph === GLYPHS.potion) {
                potions.push(createPotion(position));
            } else if (glyph === GLYPHS.player) {
                playerStart = position;
            } else if (enemyKind) {
                enemyCounts[enemyKind] += 1;
                enemies.push(createEnemy({ id: `${enemyKind}_${enemyCounts[enemyKind]}`, kind: enemyKind, position }));
            }
        }
    });

    return {
        walls,
        enemies,
        potions,
        playerStart,
        width: rows.reduce((max, row) => Math.max(max, row.length), 0),
        height: rows.length,
    };
};
