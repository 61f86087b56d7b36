import type { SensorRecord } from '@/types';
import type { SummaryLine, SummaryOptions, TransitionEntry } from './types';
import { stampOf, stampText } from './recordFields';
import { PLACEHOLDER_TEXT } from './viewerDefaults';

/**
 * Summarizes how `field` changes around `anchor`.
 *
 * Records within `horizonMicros` of the anchor's stamp (either side) are
 * collapsed into runs of equal value, one entry per run. The anchor's run is
 * always kept; further runs are taken alternately from before and after it,
 * nearest first, until `maxLines` entries are chosen. Entries come back in
 * chronological order.
 */
export const summarizeTransitions = (
    records: readonly SensorRecord[],
    field: string,
    anchor: number,
    options: SummaryOptions
): TransitionEntry[] => {
    if (anchor < 0 || anchor >= records.length) return [];

    const horizon = Math.max(0, options.horizonMicros);
    const anchorStamp = stampOf(records[anchor]);
    let lo = anchor;
    let hi = anchor;
    if (anchorStamp !== null) {
        while (lo > 0) {
            const stamp = stampOf(records[lo - 1]);
            if (stamp === null || stamp < anchorStamp - horizon) break;
            lo--;
        }
        while (hi < records.length - 1) {
            const stamp = stampOf(records[hi + 1]);
            if (stamp === null || stamp > anchorStamp + horizon) break;
            hi++;
        }
    }

    const runs: TransitionEntry[] = [];
    let anchorRun = 0;
    for (let i = lo; i <= hi; i++) {
        const value = records[i][field] ?? null;
        const last = runs[runs.length - 1];
        if (last !== undefined && last.value === value) {
            last.repeated = true;
        } else {
            runs.push({ index: i, stamp: stampOf(records[i]), value, repeated: false, isAnchor: false });
        }
        if (i === anchor) anchorRun = runs.length - 1;
    }
    runs[anchorRun].isAnchor = true;

    const limit = Math.max(1, Math.floor(options.maxLines));
    let first = anchorRun;
    let last = anchorRun;
    let takeBefore = true;
    while (last - first + 1 < limit && (first > 0 || last < runs.length - 1)) {
        if ((takeBefore && first > 0) || last >= runs.length - 1) {
            first--;
        } else {
            last++;
        }
        takeBefore = !takeBefore;
    }

    return runs.slice(first, last + 1);
};

export const formatSummaryLines = (entries: TransitionEntry[]): SummaryLine[] => {
    return entries.map((entry): SummaryLine => [
        stampText(entry.stamp),
        entry.value === null ? PLACEHOLDER_TEXT : String(entry.value),
        entry.repeated ? PLACEHOLDER_TEXT : ''
    ]);
};
