const PALETTE = [
    '#1f77b4',
    '#ff7f0e',
    '#2ca02c',
    '#d62728',
    '#9467bd',
    '#8c564b',
    '#e377c2',
    '#7f7f7f',
    '#bcbd22',
    '#17becf'
];

export interface LegendEntry {
    label: string;
    color: string;
}

/**
 * Known activity labels in the order they were first seen. Colors cycle
 * through the palette by that order and stay fixed until `clear()`.
 */
export class LabelPalette {
    private colors = new Map<string, string>();

    add(label: string | null): void {
        if (label === null || label.length === 0 || this.colors.has(label)) return;
        this.colors.set(label, PALETTE[this.colors.size % PALETTE.length]);
    }

    has(label: string): boolean {
        return this.colors.has(label);
    }

    colorOf(label: string | null): string | null {
        if (label === null) return null;
        return this.colors.get(label) ?? null;
    }

    labels(): string[] {
        return [...this.colors.keys()];
    }

    legend(): LegendEntry[] {
        return [...this.colors].map(([label, color]) => ({ label, color }));
    }

    clear(): void {
        this.colors.clear();
    }
}
