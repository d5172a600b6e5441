import { MESSAGE_LOG_LIMIT } from '../constants';

export type MessageLevel = 'INFO' | 'CRITICAL';
export type MessageChannel = 'COMBAT' | 'PICKUP' | 'SYSTEM';

/** `[LEVEL|CHANNEL] text`, parsed back by the front end's log classifier. */
export const tagMessage = (text: string, level: MessageLevel, channel: MessageChannel): string =>
    `[${level}|${channel}] ${text}`;

export const appendTaggedMessage = (
    log: string[],
    text: string,
    level: MessageLevel = 'INFO',
    channel: MessageChannel = 'SYSTEM'
): string[] => [...log, tagMessage(text, level, channel)].slice(-MESSAGE_LOG_LIMIT);

const overlapsAt = (before: string[], after: string[], k: number): boolean => {
    const offset = before.length - k;
    for (let i = 0; i < k; i++) {
        if (before[offset + i] !== after[i]) return false;
    }
    return true;
};

/**
 * Lines in `after` that were appended since `before`. The capped log may have
 * dropped lines from the front, so the longest suffix of `before` that is a
 * prefix of `after` marks where the new lines start.
 */
export const newLogLines = (before: string[], after: string[]): string[] => {
    for (let k = Math.min(before.length, after.length); k > 0; k--) {
        if (overlapsAt(before, after, k)) return after.slice(k);
    }
    return after;
};
