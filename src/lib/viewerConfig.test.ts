import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    defaultViewerConfig,
    labelForKey,
    loadViewerConfig,
    parseViewerConfig,
    saveViewerConfig,
    summaryOptionsOf
} from './viewerConfig';
import { ConfigError } from './errors';

describe('parseViewerConfig', () => {
    it('fills every missing key with its default', () => {
        const result = parseViewerConfig({});

        expect(result.success).toBe(true);
        expect(result.data).toEqual({
            sensors: { windowSize: 500, resizeStep: 10, navigateStep: 10 },
            gps: { windowSize: 20, resizeStep: 5, navigateStep: 5 },
            labels: { searchHorizonSeconds: 60, maxLines: 7, keys: {} }
        });
    });

    it('keeps values that are given', () => {
        const result = parseViewerConfig({ gps: { windowSize: 40 }, labels: { keys: { w: 'walk' } } });

        expect(result.data?.gps).toEqual({ windowSize: 40, resizeStep: 5, navigateStep: 5 });
        expect(result.data?.labels.keys).toEqual({ w: 'walk' });
    });

    it('reports the path of each invalid value', () => {
        const result = parseViewerConfig({ sensors: { windowSize: 0 }, labels: { maxLines: 'seven' } });

        expect(result.success).toBe(false);
        expect(result.errors).toEqual([
            'sensors.windowSize: Number must be greater than 0',
            'labels.maxLines: Expected number, received string'
        ]);
    });

    it('rejects key bindings longer than one character', () => {
        expect(parseViewerConfig({ labels: { keys: { wk: 'walk' } } }).success).toBe(false);
    });
});

describe('viewer config files', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'viewer-config-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('falls back to defaults without a file', async () => {
        expect(await loadViewerConfig()).toEqual(defaultViewerConfig());
        expect(await loadViewerConfig(join(dir, 'missing.json'))).toEqual(defaultViewerConfig());
    });

    it('reads back what it saves', async () => {
        const path = join(dir, 'viewer.json');
        const config = defaultViewerConfig();
        config.sensors.windowSize = 250;
        config.labels.keys = { b: 'bus' };

        await saveViewerConfig(config, path);

        expect(await loadViewerConfig(path)).toEqual(config);
    });

    it('throws a ConfigError for broken JSON', async () => {
        const path = join(dir, 'broken.json');
        await writeFile(path, '{ "sensors": ');

        await expect(loadViewerConfig(path)).rejects.toBeInstanceOf(ConfigError);
    });

    it('lists the invalid settings in the ConfigError', async () => {
        const path = join(dir, 'invalid.json');
        await writeFile(path, JSON.stringify({ gps: { navigateStep: -1 } }));

        const failure = await loadViewerConfig(path).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ConfigError);
        expect(failure).toMatchObject({ issues: ['gps.navigateStep: Number must be greater than 0'] });
    });
});

describe('config lookups', () => {
    it('finds the label bound to a key', () => {
        const config = defaultViewerConfig();
        config.labels.keys = { w: 'walk' };

        expect(labelForKey(config, 'w')).toBe('walk');
        expect(labelForKey(config, 'x')).toBeNull();
    });

    it('converts the label settings to summary options', () => {
        expect(summaryOptionsOf(defaultViewerConfig())).toEqual({ maxLines: 7, horizonMicros: 60_000_000 });
    });
});
