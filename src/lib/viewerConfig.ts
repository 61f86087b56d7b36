import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { VIEWER_DEFAULTS } from '@/core/viewerDefaults';
import { ConfigError } from './errors';
import { secondsToMicros } from './timeFormat';
import type { SummaryOptions } from '@/core/types';

const positiveInt = z.number().int().positive();

const windowSection = (defaults: { windowSize: number; resizeStep: number; navigateStep: number }) =>
    z.object({
        windowSize: positiveInt.default(defaults.windowSize),
        resizeStep: positiveInt.default(defaults.resizeStep),
        navigateStep: positiveInt.default(defaults.navigateStep)
    });

/**
 * Viewer settings as stored on disk. Every key is optional in the file and
 * falls back to the built-in default.
 */
export const ViewerConfigSchema = z.object({
    sensors: windowSection(VIEWER_DEFAULTS.sensors).default({}),
    gps: windowSection(VIEWER_DEFAULTS.gps).default({}),
    labels: z.object({
        searchHorizonSeconds: z.number().nonnegative().default(VIEWER_DEFAULTS.labels.searchHorizonSeconds),
        maxLines: positiveInt.default(VIEWER_DEFAULTS.labels.maxLines),
        // single key → activity label
        keys: z.record(z.string().length(1), z.string().min(1)).default({})
    }).default({})
});

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;

export const defaultViewerConfig = (): ViewerConfig => ViewerConfigSchema.parse({});

/**
 * Validate a config object and return detailed error messages
 */
export function parseViewerConfig(input: unknown): {
    success: boolean;
    errors?: string[];
    data?: ViewerConfig;
} {
    const result = ViewerConfigSchema.safeParse(input);

    if (result.success) {
        return { success: true, data: result.data };
    }

    const errors = result.error.errors.map(err => {
        const path = err.path.join('.');
        return `${path}: ${err.message}`;
    });

    return { success: false, errors };
}

const isMissingFile = (error: unknown): boolean => {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

/**
 * Reads the config file at `filePath`. A missing path or file yields the
 * defaults; unreadable JSON or invalid values throw a ConfigError.
 */
export const loadViewerConfig = async (filePath?: string): Promise<ViewerConfig> => {
    if (filePath === undefined) return defaultViewerConfig();

    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) return defaultViewerConfig();
        throw error;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`${filePath} is not valid JSON`, [error instanceof Error ? error.message : String(error)]);
    }

    const result = parseViewerConfig(raw);
    if (!result.success || result.data === undefined) {
        throw new ConfigError(`${filePath} has invalid settings`, result.errors ?? []);
    }
    return result.data;
};

export const saveViewerConfig = async (config: ViewerConfig, filePath: string): Promise<void> => {
    await writeFile(filePath, JSON.stringify(config, null, 2) + '\n', 'utf8');
};

export const labelForKey = (config: ViewerConfig, key: string): string | null => {
    return config.labels.keys[key] ?? null;
};

export const summaryOptionsOf = (config: ViewerConfig): SummaryOptions => ({
    maxLines: config.labels.maxLines,
    horizonMicros: secondsToMicros(config.labels.searchHorizonSeconds)
});
