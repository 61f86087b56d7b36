import { describe, expect, it } from 'vitest';
import { DataWindowList } from './dataWindows';
import type { DataWindow } from './types';

describe('DataWindowList', () => {
    it('keeps windows in the order they were added', () => {
        const list = new DataWindowList();
        list.add({ iStart: 0, iLast: 3, label: 'walk' });
        list.add({ iStart: 4, iLast: 9, label: 'bus' });

        expect(list.size).toBe(2);
        expect(list.all().map(window => window.label)).toEqual(['walk', 'bus']);
    });

    it('stores a copy of each window', () => {
        const list = new DataWindowList();
        const window: DataWindow = { iStart: 0, iLast: 3, label: 'walk' };
        list.add(window);
        window.label = 'run';

        const stored = list.current();
        expect(stored).toEqual({ iStart: 0, iLast: 3, label: 'walk' });
        if (stored !== null) stored.iLast = 99;
        expect(list.at(0)?.iLast).toBe(3);
    });

    it('moves its index within the list', () => {
        const list = new DataWindowList();
        list.add({ iStart: 0, iLast: 1, label: null });
        list.add({ iStart: 2, iLast: 3, label: null });

        expect(list.previous()).toBe(false);
        expect(list.next()).toBe(true);
        expect(list.index).toBe(1);
        expect(list.current()?.iStart).toBe(2);
        expect(list.next()).toBe(false);
        expect(list.previous()).toBe(true);
        expect(list.index).toBe(0);
    });

    it('is empty after clear', () => {
        const list = new DataWindowList();
        list.add({ iStart: 0, iLast: 1, label: 'walk' });
        list.next();
        list.clear();

        expect(list.size).toBe(0);
        expect(list.index).toBe(0);
        expect(list.current()).toBeNull();
        expect(list.next()).toBe(false);
    });
});
