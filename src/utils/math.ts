/**
 * Rounds to a fixed number of decimals, dropping floating point noise such as 0.30000000000000004.
 */
export function roundTo(value: number, decimals: number): number {
    return normalizeZero(parseFloat(value.toFixed(decimals)));
}

/**
 * Math.round(-0.4) is -0, which would be written out as "-0".
 */
export function normalizeZero(value: number): number {
    return value === 0 ? 0 : value;
}

export function uniqueSortedAscending(values: readonly number[]): number[] {
    return [...new Set(values)].sort((a, b) => a - b);
}
