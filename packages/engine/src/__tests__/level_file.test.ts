import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadLevelFile } from '../systems/level-file';
import { LevelLoadError, isLevelLoadError } from '../systems/errors';

const captureError = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
};

describe('level file loading', () => {
    let dir = '';

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'lantern-level-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('returns the raw text', () => {
        const path = join(dir, 'level.txt');
        writeFileSync(path, '#@#\n#r#\n');
        expect(loadLevelFile(path)).toBe('#@#\n#r#\n');
    });

    it('reports a missing file', () => {
        const path = join(dir, 'missing.txt');
        const err = captureError(() => loadLevelFile(path));

        expect(isLevelLoadError(err)).toBe(true);
        expect(err).toBeInstanceOf(LevelLoadError);
        if (!isLevelLoadError(err)) return;
        expect(err.code).toBe('LEVEL_NOT_FOUND');
        expect(err.message).toBe(`Level file not found: ${path}`);
        expect(err.details).toEqual({ path });
    });

    it('reports a path that cannot be read as text', () => {
        const err = captureError(() => loadLevelFile(dir));

        expect(isLevelLoadError(err)).toBe(true);
        if (!isLevelLoadError(err)) return;
        expect(err.code).toBe('LEVEL_UNREADABLE');
        expect(err.name).toBe('LevelLoadError');
    });
});
