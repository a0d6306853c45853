import { Combination, ResolvedOptionSets } from './types';

/**
 * GENERATOR: yields the cartesian product of the resolved option sets, one combination at a time.
 * Options vary in map order with the last one varying fastest.
 * No option sets at all yield exactly one empty combination.
 */
export function* generateCombinations(sets: ResolvedOptionSets): Generator<Combination> {
    const entries = [...sets.entries()];

    function* combine(current: Combination, optionIdx: number): Generator<Combination> {
        if (optionIdx === entries.length) {
            yield current;
            return;
        }

        const [name, values] = entries[optionIdx];

        for (const value of values) {
            yield* combine({ ...current, [name]: value }, optionIdx + 1);
        }
    }

    yield* combine({}, 0);
}

/**
 * Restartable view of {@link generateCombinations}: every iteration starts again from the first combination.
 */
export function enumerateCombinations(sets: ResolvedOptionSets): Iterable<Combination> {
    return {
        [Symbol.iterator]: () => generateCombinations(sets),
    };
}
