/**
 * Error codes for level loading. Discriminated so callers can branch on them.
 */
export type LevelLoadErrorCode =
    | 'LEVEL_NOT_FOUND'
    | 'LEVEL_UNREADABLE';

export class LevelLoadError extends Error {
    readonly name = 'LevelLoadError';

    constructor(
        public readonly code: LevelLoadErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>,
    ) {
        super(message);

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, LevelLoadError);
        }
    }

    static notFound(path: string): LevelLoadError {
        return new LevelLoadError('LEVEL_NOT_FOUND', `Level file not found: ${path}`, { path });
    }

    static unreadable(path: string, cause: unknown): LevelLoadError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new LevelLoadError('LEVEL_UNREADABLE', `Level file could not be read: ${path} (${reason})`, { path, reason });
    }
}

export const isLevelLoadError = (value: unknown): value is LevelLoadError =>
    value instanceof LevelLoadError;
