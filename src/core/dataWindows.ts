import type { DataWindow } from './types';

const copyWindow = (dataWindow: DataWindow): DataWindow => ({ ...dataWindow });

/**
 * Ordered explicit windows with a position of their own. Windows are copied
 * on the way in and out, so later edits to a caller's object do not leak in.
 */
export class DataWindowList {
    private windows: DataWindow[] = [];
    private position = 0;

    get size(): number {
        return this.windows.length;
    }

    get index(): number {
        return this.position;
    }

    add(dataWindow: DataWindow): void {
        this.windows.push(copyWindow(dataWindow));
    }

    at(index: number): DataWindow | null {
        const found = this.windows[index];
        return found === undefined ? null : copyWindow(found);
    }

    current(): DataWindow | null {
        return this.at(this.position);
    }

    next(): boolean {
        if (this.position + 1 >= this.windows.length) return false;
        this.position++;
        return true;
    }

    previous(): boolean {
        if (this.position === 0) return false;
        this.position--;
        return true;
    }

    all(): DataWindow[] {
        return this.windows.map(copyWindow);
    }

    clear(): void {
        this.windows = [];
        this.position = 0;
    }
}
