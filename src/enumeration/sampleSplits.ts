import { normalizeZero, roundTo, uniqueSortedAscending } from '@src/utils/math';

import { InvalidSpecError } from './errors';

export const DEFAULT_SPLITS = 1;

/**
 * Decimals kept for points of non-integer ranges.
 */
const DECIMAL_PRECISION = 10;

/**
 * Samples `splits + 2` evenly spaced points of [min, max], both ends included.
 *
 * Integer ranges cap the split count at what their cardinality allows,
 * so `sampleSplits(0, 3, 10)` gives `[0, 1, 2, 3]` instead of repeated points.
 */
export function sampleSplits(min: number, max: number, splits: number, integer: boolean = true): number[] {
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
        throw new InvalidSpecError(`Range bounds must be finite numbers, got [${min}, ${max}]`);
    }
    if (min > max) {
        throw new InvalidSpecError(`Range min ${min} is greater than max ${max}`);
    }
    if (!Number.isInteger(splits) || splits < 0) {
        throw new InvalidSpecError(`Splits must be a non-negative integer, got ${splits}`);
    }
    if (integer && (!Number.isInteger(min) || !Number.isInteger(max))) {
        throw new InvalidSpecError(`Integer range needs integer bounds, got [${min}, ${max}]`);
    }

    const effectiveSplits = integer ? Math.min(splits, Math.max(0, max - min + 1 - 2)) : splits;
    const round = integer
        ? (value: number) => normalizeZero(Math.round(value))
        : (value: number) => roundTo(value, DECIMAL_PRECISION);
    const step = (max - min) / (effectiveSplits + 1);

    const points: number[] = [min];
    for (let i = 1; i <= effectiveSplits; i++) {
        points.push(round(min + i * step));
    }
    points.push(max);

    return uniqueSortedAscending(points);
}
