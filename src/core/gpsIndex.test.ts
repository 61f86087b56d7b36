import { describe, expect, it } from 'vitest';
import { GpsRunIndex } from './gpsIndex';
import type { SensorRecord } from '@/types';

const BASE = Date.UTC(2024, 0, 1) * 1000;

const row = (second: number, coordinates: [number, number] | null, valid = '1'): SensorRecord => ({
    stamp: BASE + second * 1_000_000,
    latitude: coordinates === null ? null : coordinates[0],
    longitude: coordinates === null ? null : coordinates[1],
    is_gps_valid: valid
});

const buildIndex = (rows: SensorRecord[], settings = { windowSize: 2, resizeStep: 1, navigateStep: 1 }) => {
    const index = new GpsRunIndex(settings);
    index.loadInit();
    rows.forEach((record, i) => index.extend(record, i));
    index.loadEnd();
    return index;
};

describe('GpsRunIndex', () => {
    it('splits consecutive shared coordinates into runs', () => {
        const index = buildIndex([
            row(0, [1, 1]),
            row(1, [1, 1]),
            row(2, [2, 2]),
            row(3, [2, 2]),
            row(4, [2, 2])
        ]);

        expect(index.getRuns()).toEqual([
            {
                longitude: 1,
                latitude: 1,
                startStamp: BASE,
                lastStamp: BASE + 1_000_000,
                count: 2,
                isValid: true,
                firstRowIndex: 0,
                lastRowIndex: 1
            },
            {
                longitude: 2,
                latitude: 2,
                startStamp: BASE + 2_000_000,
                lastStamp: BASE + 4_000_000,
                count: 3,
                isValid: true,
                firstRowIndex: 2,
                lastRowIndex: 4
            }
        ]);
    });

    it('creates one run per distinct coordinate', () => {
        const rows = [0, 1, 2, 3, 4, 5].map(i => row(i, [i, -i]));
        const index = buildIndex(rows);

        expect(index.size).toBe(6);
        expect(index.getRuns().every(run => run.count === 1)).toBe(true);
    });

    it('creates a single run when every row shares a coordinate', () => {
        const rows = [0, 1, 2, 3, 4, 5, 6].map(i => row(i, [3.5, 7.25]));
        const index = buildIndex(rows);

        expect(index.size).toBe(1);
        expect(index.getRuns()[0]).toMatchObject({ count: 7, firstRowIndex: 0, lastRowIndex: 6 });
    });

    it('starts a run at the first fix whatever its coordinates', () => {
        const index = buildIndex([row(0, [-1, -1]), row(1, [-1, -1])]);

        expect(index.size).toBe(1);
        expect(index.getRuns()[0]).toMatchObject({ latitude: -1, longitude: -1, count: 2 });
    });

    it('skips rows without a fix without breaking the run', () => {
        const index = buildIndex([
            row(0, null),
            row(1, [1, 1]),
            row(2, null),
            row(3, [1, 1]),
            row(4, [2, 2])
        ]);

        expect(index.getRuns().map(run => [run.count, run.firstRowIndex, run.lastRowIndex])).toEqual([
            [2, 1, 3],
            [1, 4, 4]
        ]);
    });

    it('takes validity from the row that starts each run', () => {
        const index = buildIndex([row(0, [1, 1], '0'), row(1, [1, 1], '1'), row(2, [2, 2], '1')]);

        expect(index.getRuns().map(run => run.isValid)).toEqual([false, true]);
        expect(index.track().valid).toEqual([false, true]);
    });

    it('reads a float-typed validity column', () => {
        const index = buildIndex([
            { ...row(0, [1, 1]), is_gps_valid: 0 },
            { ...row(1, [2, 2]), is_gps_valid: 1 },
            { ...row(2, [3, 3]), is_gps_valid: null }
        ]);

        expect(index.getRuns().map(run => run.isValid)).toEqual([false, true, true]);
    });

    it('refuses rows before loadInit', () => {
        const index = new GpsRunIndex();

        expect(() => index.extend(row(0, [1, 1]), 0)).toThrow('loadInit() must be called before extend()');
    });

    it('marks every run in the window and the projection', () => {
        const index = buildIndex([0, 1, 2, 3].map(i => row(i, [i, i])));

        expect(index.dataHasChanged).toBe(false);
        expect(index.markWindow(false)).toBe(true);

        expect(index.getRuns().map(run => run.isValid)).toEqual([false, false, true, true]);
        expect(index.track().valid).toEqual([false, false, true, true]);
        expect(index.dataHasChanged).toBe(true);

        index.markMerged();
        expect(index.dataHasChanged).toBe(false);
    });

    it('does nothing when marking an empty index', () => {
        const index = buildIndex([row(0, null), row(1, null)]);

        expect(index.hasData).toBe(false);
        expect(index.cursor.state).toBe('EMPTY');
        expect(index.markWindow(false)).toBe(false);
        expect(index.dataHasChanged).toBe(false);
    });

    it('reports the runs in the window and the track', () => {
        const index = buildIndex([0, 1, 2].map(i => row(i, [10 + i, 20 + i])));

        expect(index.windowRuns().map(run => run.latitude)).toEqual([10, 11]);
        expect(index.track()).toEqual({
            longitudes: [20, 21, 22],
            latitudes: [10, 11, 12],
            valid: [true, true, true]
        });
    });

    it('formats run stamps for display', () => {
        const index = buildIndex([0, 1, 2, 3].map(i => row(i, [i, i])));
        index.cursor.stepForward();

        expect(index.getFirstStamp()).toBe('2024-01-01 00:00:01.000000');
        expect(index.getCurrentStamp()).toBe('2024-01-01 00:00:02.000000');
        expect(index.getLastStamp()).toBe('2024-01-01 00:00:03.000000');
    });

    it('shows placeholders without data', () => {
        const index = new GpsRunIndex();

        expect(index.getFirstStamp()).toBe('...');
        expect(index.getCurrentStamp()).toBe('...');
        expect(index.getLastStamp()).toBe('...');
    });

    it('drops everything from an abandoned load', () => {
        const index = buildIndex([row(0, [1, 1])]);
        index.loadInit();
        index.extend(row(0, [5, 5]), 0);
        index.abandonLoad();

        expect(index.hasData).toBe(false);
        expect(index.cursor.state).toBe('EMPTY');
        expect(index.track().latitudes).toEqual([]);
    });
});
