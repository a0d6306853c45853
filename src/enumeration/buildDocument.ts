import { RandomSource } from '@src/utils/data/data';

import { fillFallback } from './fillFallback';
import { Combination, GameDocument, GameJob, OptionValue } from './types';

/**
 * Assembles the complete document for one combination: one entry per declared option,
 * in declaration order, enumerated values first and the game's fallback behavior for the rest.
 *
 * @param index 1-based position of the combination, used for the document name
 */
export function buildDocument(
    job: GameJob,
    combination: Combination,
    index: number,
    rng: RandomSource = Math.random,
): GameDocument {
    const options: Record<string, OptionValue> = {};

    for (const [name, schema] of job.schemas) {
        options[name] = Object.prototype.hasOwnProperty.call(combination, name)
            ? combination[name]
            : fillFallback(schema, job.behavior, rng);
    }

    const label = `${job.game}${index}`;

    return {
        name: label,
        description: label,
        game: job.game,
        metadata: { ...job.metadata },
        options: options,
    };
}
