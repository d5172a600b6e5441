import { describe, expect, it } from 'vitest';
import { keyToAction } from '../input';

describe('keyToAction', () => {
  it('maps arrow keys to moves', () => {
    expect(keyToAction('', { upArrow: true })).toEqual({ type: 'MOVE', direction: 'up' });
    expect(keyToAction('', { downArrow: true })).toEqual({ type: 'MOVE', direction: 'down' });
    expect(keyToAction('', { leftArrow: true })).toEqual({ type: 'MOVE', direction: 'left' });
    expect(keyToAction('', { rightArrow: true })).toEqual({ type: 'MOVE', direction: 'right' });
  });

  it('maps WASD in either case', () => {
    expect(keyToAction('w', {})).toEqual({ type: 'MOVE', direction: 'up' });
    expect(keyToAction('A', {})).toEqual({ type: 'MOVE', direction: 'left' });
    expect(keyToAction('s', {})).toEqual({ type: 'MOVE', direction: 'down' });
    expect(keyToAction('D', {})).toEqual({ type: 'MOVE', direction: 'right' });
  });

  it('quits on q or escape', () => {
    expect(keyToAction('q', {})).toEqual({ type: 'QUIT' });
    expect(keyToAction('Q', {})).toEqual({ type: 'QUIT' });
    expect(keyToAction('', { escape: true })).toEqual({ type: 'QUIT' });
  });

  it('waits on any other key', () => {
    expect(keyToAction('x', {})).toEqual({ type: 'WAIT' });
    expect(keyToAction(' ', {})).toEqual({ type: 'WAIT' });
    expect(keyToAction('', {})).toEqual({ type: 'WAIT' });
  });
});
