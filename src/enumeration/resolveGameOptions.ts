import { SchemaLookupError } from './errors';
import { resolveOption } from './resolveOption';
import { GameJob, ResolvedOptionSet, ResolvedOptionSets } from './types';

/**
 * Resolves every enumerated option of a game, keyed and ordered by schema declaration.
 *
 * @throws SchemaLookupError when a requested option is not declared for the game
 * @throws InvalidSpecError when a requested option's spec is outside its domain
 */
export function resolveGameOptions(job: GameJob): ResolvedOptionSets {
    for (const name of job.specs.keys()) {
        if (!job.schemas.has(name)) {
            throw new SchemaLookupError('The option is not declared for this game', { game: job.game, option: name });
        }
    }

    const sets = new Map<string, ResolvedOptionSet>();

    for (const [name, schema] of job.schemas) {
        const spec = job.specs.get(name);
        if (spec) {
            sets.set(name, resolveOption(name, schema, spec, job.splits));
        }
    }

    return sets;
}
