/**
 * Percentage with one decimal, truncated rather than rounded.
 */
export const percentOf = (position: number, total: number): number => {
    if (total <= 0) return 0;
    return Math.floor((1000 * position) / total) / 10;
};

export const loadingMessage = (rowsLoaded: number, stamp: string): string => {
    return `Loading file...\n${rowsLoaded} rows loaded\nAt stamp: ${stamp}`;
};

export const savingMessage = (position: number, total: number): string => {
    return `Saving to data file...\nAt ${percentOf(position, total)}% of the data...`;
};

export const mergingMessage = (firstRowIndex: number, total: number, stamp: string): string => {
    return `Merging GPS data changes to Sensor data...\nAt ${percentOf(firstRowIndex, total)}% of data.\n${stamp}`;
};

export const NOTHING_TO_SAVE = 'No changes to our data, nothing to save!';
export const NOTHING_TO_MERGE = 'No changes to GPS labels, nothing to merge!';
