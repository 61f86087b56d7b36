import type { MicroEpoch, SensorRecord } from '@/types';
import { GPS_VALID_FIELD, LATITUDE_FIELD, LONGITUDE_FIELD, STAMP_FIELD } from '@/types';
import { formatStamp } from '@/lib/timeFormat';
import { PLACEHOLDER_TEXT } from './viewerDefaults';

export type GpsValidText = '0' | '1';

export const gpsValidText = (valid: boolean): GpsValidText => (valid ? '1' : '0');

export const stampOf = (record: SensorRecord): MicroEpoch | null => {
    const value = record[STAMP_FIELD];
    return typeof value === 'number' ? value : null;
};

export const stampText = (stamp: MicroEpoch | null): string => {
    return stamp === null ? PLACEHOLDER_TEXT : formatStamp(stamp);
};

/**
 * Anything other than an explicit 0 counts as valid, matching the default
 * given to files without the column. A float-typed column reads as a number.
 */
export const isGpsValid = (record: SensorRecord): boolean => {
    const value = record[GPS_VALID_FIELD];
    return value !== '0' && value !== 0;
};

export const coordinatesOf = (record: SensorRecord): { latitude: number; longitude: number } | null => {
    const latitude = record[LATITUDE_FIELD];
    const longitude = record[LONGITUDE_FIELD];
    if (typeof latitude !== 'number' || typeof longitude !== 'number') return null;
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
    return { latitude, longitude };
};
