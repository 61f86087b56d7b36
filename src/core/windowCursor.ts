import type {
    CursorState,
    IndexRange,
    WindowPolicyResult,
    WindowSettings,
    WindowSnapshot
} from './types';
import { applyWindowSizePolicy } from './windowPolicy';

/**
 * Movable, resizable window over a sequence of `size` items.
 *
 * EMPTY until `activate()` is called with a non-empty size; every operation
 * then returns false. While ACTIVE, `0 <= startIndex` and
 * `startIndex + length <= size` hold after every call.
 */
export abstract class WindowCursor {
    private requested: WindowSettings;
    private effective: WindowSettings;
    private start = 0;
    private total = 0;

    constructor(settings: WindowSettings) {
        this.requested = { ...settings };
        this.effective = { ...settings };
    }

    get state(): CursorState {
        return this.total > 0 ? 'ACTIVE' : 'EMPTY';
    }

    get startIndex(): number {
        return this.start;
    }

    get length(): number {
        return this.effective.windowSize;
    }

    get size(): number {
        return this.total;
    }

    get resizeStep(): number {
        return this.effective.resizeStep;
    }

    get navigateStep(): number {
        return this.effective.navigateStep;
    }

    isActive(): boolean {
        return this.total > 0;
    }

    /** Index of the last item inside the window. */
    get lastIndex(): number {
        return this.start + this.effective.windowSize - 1;
    }

    range(): IndexRange {
        return { start: this.start, end: this.start + this.effective.windowSize };
    }

    snapshot(): WindowSnapshot {
        return {
            state: this.state,
            startIndex: this.start,
            size: this.total,
            ...this.effective
        };
    }

    reset(): void {
        this.total = 0;
        this.start = 0;
        this.effective = { ...this.requested };
    }

    /**
     * Enters ACTIVE over `size` items with the window at the beginning.
     * A size of zero leaves the cursor EMPTY.
     */
    activate(size: number): WindowPolicyResult {
        this.reset();
        if (size <= 0) {
            return { settings: { ...this.requested }, changed: [] };
        }
        this.total = size;
        return this.configure(this.requested);
    }

    /**
     * Applies new settings through the window size policy. The requested
     * values are kept so that a later, larger sequence gets them unclamped.
     */
    configure(settings: WindowSettings): WindowPolicyResult {
        this.requested = { ...settings };
        const result = applyWindowSizePolicy(settings, this.total);
        this.effective = { ...result.settings };
        if (this.isActive()) {
            this.start = Math.max(0, Math.min(this.start, this.total - this.effective.windowSize));
        }
        return result;
    }

    stepForward(): boolean {
        if (!this.isActive()) return false;
        const end = this.start + this.effective.windowSize + this.effective.navigateStep;
        if (!this.fitsAfterStep(end)) return false;
        this.start += this.effective.navigateStep;
        return true;
    }

    stepBackward(): boolean {
        if (!this.isActive()) return false;
        if (this.start - this.effective.navigateStep < 0) return false;
        this.start -= this.effective.navigateStep;
        return true;
    }

    growWindow(): boolean {
        if (!this.isActive()) return false;
        if (this.start + this.effective.windowSize + this.effective.resizeStep > this.total) return false;
        this.effective.windowSize += this.effective.resizeStep;
        return true;
    }

    shrinkWindow(): boolean {
        if (!this.isActive()) return false;
        if (this.effective.windowSize - this.effective.resizeStep < 1) return false;
        this.effective.windowSize -= this.effective.resizeStep;
        return true;
    }

    gotoFraction(fraction: number): boolean {
        if (!this.isActive()) return false;
        if (!(fraction >= 0 && fraction <= 1)) return false;
        this.start = this.startForFraction(fraction);
        return true;
    }

    /** Whether a window ending (exclusive) at `end` is still allowed after a forward step. */
    protected abstract fitsAfterStep(end: number): boolean;

    protected abstract startForFraction(fraction: number): number;
}

export class SensorWindowCursor extends WindowCursor {
    protected fitsAfterStep(end: number): boolean {
        return end <= this.size;
    }

    protected startForFraction(fraction: number): number {
        return Math.floor(fraction * (this.size - this.length));
    }
}

/**
 * Cursor over GPS runs. Stepping forward never lets the window touch the
 * final run, and seeking scales over the whole sequence before clamping.
 */
export class GpsWindowCursor extends WindowCursor {
    protected fitsAfterStep(end: number): boolean {
        return end < this.size;
    }

    protected startForFraction(fraction: number): number {
        return Math.min(Math.floor(fraction * this.size), this.size - this.length);
    }
}
