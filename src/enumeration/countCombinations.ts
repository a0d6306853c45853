import { SizeThresholdExceeded } from './errors';
import { ResolvedOptionSets } from './types';

export const DEFAULT_SIZE_THRESHOLD = 1000;

export type SizeVerdict =
    | {
          action: 'continue';
      }
    | {
          action: 'abort';
          exceeded: SizeThresholdExceeded;
      };

/**
 * Number of combinations the resolved sets produce, computed without generating any of them.
 */
export function countCombinations(sets: ResolvedOptionSets): number {
    let count = 1;

    for (const values of sets.values()) {
        count *= values.length;
    }

    return count;
}

/**
 * Totals above the threshold need the operator's confirmation before generation starts.
 */
export function checkSize(total: number, threshold: number = DEFAULT_SIZE_THRESHOLD, game?: string): SizeVerdict {
    if (total > threshold) {
        return {
            action: 'abort',
            exceeded: new SizeThresholdExceeded(total, threshold, game),
        };
    }

    return { action: 'continue' };
}
