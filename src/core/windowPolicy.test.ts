import { describe, expect, it } from 'vitest';
import { applyWindowSizePolicy } from './windowPolicy';
import type { WindowSettings } from './types';

const settings = (windowSize: number, resizeStep: number, navigateStep: number): WindowSettings => ({
    windowSize,
    resizeStep,
    navigateStep
});

describe('applyWindowSizePolicy', () => {
    it('keeps settings that already fit', () => {
        const result = applyWindowSizePolicy(settings(20, 5, 5), 100);

        expect(result.settings).toEqual(settings(20, 5, 5));
        expect(result.changed).toEqual([]);
    });

    it('clamps the window to the sequence size', () => {
        const result = applyWindowSizePolicy(settings(500, 10, 10), 100);

        expect(result.settings).toEqual(settings(100, 10, 10));
        expect(result.changed).toEqual(['windowSize']);
    });

    it('halves step rates larger than the sequence', () => {
        const result = applyWindowSizePolicy(settings(500, 10, 10), 6);

        expect(result.settings).toEqual(settings(6, 3, 3));
        expect(result.changed).toEqual(['windowSize', 'resizeStep', 'navigateStep']);
    });

    it('never lets a step drop below one', () => {
        const result = applyWindowSizePolicy(settings(500, 10, 10), 1);

        expect(result.settings).toEqual(settings(1, 1, 1));
    });

    it('leaves settings untouched for an empty sequence', () => {
        const input = settings(500, 10, 10);
        const result = applyWindowSizePolicy(input, 0);

        expect(result.settings).toEqual(input);
        expect(result.settings).not.toBe(input);
        expect(result.changed).toEqual([]);
    });

    it('does not mutate its input', () => {
        const input = settings(500, 10, 10);
        applyWindowSizePolicy(input, 4);

        expect(input).toEqual(settings(500, 10, 10));
    });
});
