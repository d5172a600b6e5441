import { existsSync, readFileSync } from 'node:fs';
import { LevelLoadError } from './errors';

/**
 * Reads a level source from disk. Throws LevelLoadError; a run must not start
 * without a level.
 */
export const loadLevelFile = (path: string): string => {
    if (!existsSync(path)) {
        throw LevelLoadError.notFound(path);
    }
    try {
        return readFileSync(path, 'utf8');
    } catch (err) {
        throw LevelLoadError.unreadable(path, err);
    }
};
