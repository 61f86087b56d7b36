import type { WindowPolicyResult, WindowSettings } from './types';

const SETTING_KEYS: Array<keyof WindowSettings> = ['windowSize', 'resizeStep', 'navigateStep'];

/**
 * Clamps window settings to a sequence of `size` items. The window may not
 * exceed the data, and a step rate larger than the data falls back to half
 * of it (at least 1). Returns a new snapshot plus the keys that changed; the
 * input is left untouched.
 */
export const applyWindowSizePolicy = (settings: WindowSettings, size: number): WindowPolicyResult => {
    if (size <= 0) {
        return { settings: { ...settings }, changed: [] };
    }

    const halfSize = Math.max(1, Math.floor(size / 2));
    const clampStep = (step: number) => (step > size ? halfSize : Math.max(1, step));

    const next: WindowSettings = {
        windowSize: Math.max(1, Math.min(settings.windowSize, size)),
        resizeStep: clampStep(settings.resizeStep),
        navigateStep: clampStep(settings.navigateStep)
    };

    return {
        settings: next,
        changed: SETTING_KEYS.filter(key => next[key] !== settings[key])
    };
};
