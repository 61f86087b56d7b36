import type { MicroEpoch } from '@/types';

const STAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

const pad = (value: number, width: number): string => {
    return String(value).padStart(width, '0');
};

/**
 * Parses `YYYY-MM-DD HH:MM:SS.ffffff` (1-6 fraction digits) as naive
 * wall-clock time. Returns null when the text does not match or names an
 * impossible date.
 */
export const parseStamp = (text: string): MicroEpoch | null => {
    const match = STAMP_PATTERN.exec(text.trim());
    if (!match) return null;

    const [, year, month, day, hour, minute, second, fraction = ''] = match;
    const ms = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
    const check = new Date(ms);
    if (
        check.getUTCFullYear() !== Number(year)
        || check.getUTCMonth() !== Number(month) - 1
        || check.getUTCDate() !== Number(day)
        || check.getUTCHours() !== Number(hour)
        || check.getUTCMinutes() !== Number(minute)
        || check.getUTCSeconds() !== Number(second)
    ) {
        return null;
    }

    const micros = fraction.length > 0 ? Number(fraction.padEnd(6, '0')) : 0;
    return ms * 1000 + micros;
};

/**
 * Formats a microsecond epoch back to `YYYY-MM-DD HH:MM:SS.ffffff`.
 */
export const formatStamp = (stamp: MicroEpoch): string => {
    const seconds = Math.floor(stamp / 1_000_000);
    const micros = stamp - seconds * 1_000_000;
    const date = new Date(seconds * 1000);

    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)} `
        + `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}.${pad(micros, 6)}`;
};

export const secondsToMicros = (seconds: number): number => {
    return Math.round(seconds * 1_000_000);
};
