import { describe, expect, it } from 'vitest';
import { buildFrame, createEnemy, createPoint, createPotion, generateInitialState } from '@lantern/engine';
import { frameToCells, frameToRows, groupRuns } from '../render-rows';

describe('frame rasterizing', () => {
  it('draws the discovered level with the player on top', () => {
    const state = generateInitialState('#####\n#@ r#\n#K  #\n#####', 'rows');
    const rows = frameToRows(buildFrame(state));

    expect(rows.map(runs => runs.map(r => r.text).join(''))).toEqual([
      '#####',
      '#@ r#',
      '#K  #',
      '#####',
    ]);
    expect(rows[1]).toEqual([
      { text: '#', color: 'gray' },
      { text: '@', color: 'yellow' },
      { text: ' ', color: undefined },
      { text: 'r', color: 'red' },
      { text: '#', color: 'gray' },
    ]);
  });

  it('leaves unseen tiles blank', () => {
    const state = generateInitialState('@' + ' '.repeat(8) + 's', 'far');
    const cells = frameToCells(buildFrame(state));

    expect(cells[0][9]).toEqual({ glyph: ' ' });
    expect(cells[0][0]).toEqual({ glyph: '@', color: 'yellow' });
  });

  it('lets enemies cover potions', () => {
    const base = generateInitialState('@  ', 'layers');
    const frame = buildFrame({
      ...base,
      potions: [createPotion(createPoint(2, 0))],
      enemies: [createEnemy({ id: 'rat_1', kind: 'rat', position: createPoint(2, 0) })],
    });

    expect(frameToCells(frame)[0][2]).toEqual({ glyph: 'r', color: 'red' });
  });

  it('merges neighbouring cells of the same color', () => {
    expect(groupRuns([
      { glyph: '#', color: 'gray' },
      { glyph: '#', color: 'gray' },
      { glyph: ' ' },
      { glyph: ' ' },
      { glyph: 'K', color: 'magenta' },
    ])).toEqual([
      { text: '##', color: 'gray' },
      { text: '  ', color: undefined },
      { text: 'K', color: 'magenta' },
    ]);
  });
});
