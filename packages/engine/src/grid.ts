/**
 * GRID GEOMETRY
 * Square-grid math, origin top-left. Pure functions only.
 */
import type { Direction, Point } from './types';

export const createPoint = (x: number, y: number): Point => ({ x, y });

/**
 * Single source of truth for coordinate keys.
 */
export const pointToKey = (pos: Point): string => `${pos.x},${pos.y}`;

export const pointEquals = (a: Point, b: Point): boolean => a.x === b.x && a.y === b.y;

export const pointAdd = (a: Point, b: Point): Point => createPoint(a.x + b.x, a.y + b.y);

/** Euclidean distance without the square root. */
export const distanceSquared = (a: Point, b: Point): number => {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return dx * dx + dy * dy;
};

export const isInBounds = (pos: Point, width: number, height: number): boolean =>
    pos.x >= 0 && pos.x < width && pos.y >= 0 && pos.y < height;

// Order matters: random rat steps and snake tie-breaks index into it.
export const CARDINAL_DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

const DIRECTION_VECTORS: Record<Direction, Point> = {
    up: createPoint(0, -1),
    down: createPoint(0, 1),
    left: createPoint(-1, 0),
    right: createPoint(1, 0),
};

export const directionVector = (direction: Direction): Point => DIRECTION_VECTORS[direction];

export const getNeighbors = (pos: Point): Point[] =>
    CARDINAL_DIRECTIONS.map(dir => pointAdd(pos, directionVector(dir)));
