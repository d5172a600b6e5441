import type { DisplayColor, Frame, Point } from '@lantern/engine';

export interface Cell {
  glyph: string;
  color?: DisplayColor;
}

/** Consecutive cells sharing a color, drawn as one Text node. */
export interface Run {
  text: string;
  color?: DisplayColor;
}

const EMPTY: Cell = { glyph: ' ' };

const inside = (frame: Frame, pos: Point): boolean =>
  pos.x >= 0 && pos.x < frame.width && pos.y >= 0 && pos.y < frame.height;

/**
 * Rasterizes a frame. Later layers win: walls, potions, enemies, player.
 */
export const frameToCells = (frame: Frame): Cell[][] => {
  const grid: Cell[][] = Array.from({ length: frame.height }, () =>
    Array.from({ length: frame.width }, () => EMPTY)
  );

  const layers = [frame.walls, frame.potions, frame.enemies, [frame.player]];
  for (const layer of layers) {
    for (const element of layer) {
      if (!inside(frame, element.position)) continue;
      grid[element.position.y][element.position.x] = { glyph: element.glyph, color: element.color };
    }
  }
  return grid;
};

export const groupRuns = (cells: Cell[]): Run[] =>
  cells.reduce<Run[]>((runs, cell) => {
    const last = runs[runs.length - 1];
    if (last && last.color === cell.color) {
      last.text += cell.glyph;
      return runs;
    }
    runs.push({ text: cell.glyph, color: cell.color });
    return runs;
  }, []);

export const frameToRows = (frame: Frame): Run[][] => frameToCells(frame).map(groupRuns);
