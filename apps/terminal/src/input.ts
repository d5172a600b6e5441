import type { Action, Direction } from '@lantern/engine';

/** The subset of Ink's key flags the game reads. */
export interface KeyPress {
  upArrow?: boolean;
  downArrow?: boolean;
  leftArrow?: boolean;
  rightArrow?: boolean;
  escape?: boolean;
}

const LETTER_DIRECTIONS = new Map<string, Direction>([
  ['w', 'up'],
  ['s', 'down'],
  ['a', 'left'],
  ['d', 'right'],
]);

const arrowDirection = (key: KeyPress): Direction | undefined => {
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  return undefined;
};

/**
 * Every key press is a turn. Keys with no binding wait in place.
 */
export const keyToAction = (input: string, key: KeyPress): Action => {
  const lower = input.toLowerCase();
  if (key.escape || lower === 'q') return { type: 'QUIT' };

  const direction = arrowDirection(key) ?? LETTER_DIRECTIONS.get(lower);
  if (direction) return { type: 'MOVE', direction };

  return { type: 'WAIT' };
};
