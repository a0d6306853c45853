import { uniqueInOrder } from '@src/utils/data/data';
import { uniqueSortedAscending } from '@src/utils/math';

import { EnumerationError, InvalidSpecError } from './errors';
import { DEFAULT_SPLITS, sampleSplits } from './sampleSplits';
import {
    ChoiceOptionSchema,
    OptionSchema,
    OptionSpec,
    OptionValue,
    RangeOptionSchema,
    ResolvedOptionSet,
} from './types';

/**
 * Turns one option spec into the ordered values to enumerate for that option.
 *
 * @param defaultSplits split count applied when a range option is requested with "all"
 * @throws InvalidSpecError when the option spec leaves the option's declared domain
 */
export function resolveOption(
    name: string,
    schema: OptionSchema,
    spec: OptionSpec,
    defaultSplits: number = DEFAULT_SPLITS,
): ResolvedOptionSet {
    try {
        const values = resolveBySchema(schema, spec, defaultSplits);
        if (values.length === 0) {
            throw new InvalidSpecError('An explicit value list must not be empty');
        }

        return values;
    } catch (e) {
        if (e instanceof EnumerationError && e.option === undefined) {
            e.option = name;
        }
        throw e;
    }
}

function resolveBySchema(schema: OptionSchema, spec: OptionSpec, defaultSplits: number): OptionValue[] {
    switch (schema.type) {
        case 'toggle':
            return resolveToggle(spec);
        case 'choice':
            return resolveChoice(schema, spec);
        case 'range':
        case 'named_range':
            return resolveRange(schema, spec, defaultSplits);
        case 'text':
            throw new InvalidSpecError('Free text options cannot be enumerated');
    }
}

function resolveToggle(spec: OptionSpec): boolean[] {
    switch (spec.kind) {
        case 'all':
            return [false, true];
        case 'explicit':
            return uniqueInOrder(
                spec.values.map(value => {
                    if (typeof value !== 'boolean') {
                        throw new InvalidSpecError(`Toggle values must be true or false, got ${JSON.stringify(value)}`);
                    }

                    return value;
                }),
            );
        case 'splits':
            throw new InvalidSpecError('Splits only apply to range options');
    }
}

function resolveChoice(schema: ChoiceOptionSchema, spec: OptionSpec): string[] {
    switch (spec.kind) {
        case 'all':
            return [...schema.choices];
        case 'explicit':
            return uniqueInOrder(spec.values.map(value => findChoice(schema, value)));
        case 'splits': {
            // a bare number in the config reads as a split count, for choices it can only name a choice
            const choice = schema.choices.find(c => c === String(spec.count));
            if (choice === undefined) {
                throw new InvalidSpecError('Splits only apply to range options');
            }

            return [choice];
        }
    }
}

function findChoice(schema: ChoiceOptionSchema, value: OptionValue): string {
    // numeric choice names come out of YAML as numbers
    const choice = schema.choices.find(c => c === String(value));
    if (choice === undefined) {
        throw new InvalidSpecError(`"${value}" is not a declared choice, expected one of: ${schema.choices.join(', ')}`);
    }

    return choice;
}

function resolveRange(schema: RangeOptionSchema, spec: OptionSpec, defaultSplits: number): number[] {
    const special = schema.type === 'named_range' ? schema.special : {};
    const specialValues = Object.values(special);

    switch (spec.kind) {
        case 'all':
            return uniqueSortedAscending([
                ...sampleSplits(schema.min, schema.max, defaultSplits, schema.integer),
                ...specialValues,
            ]);
        case 'splits':
            return uniqueSortedAscending([
                ...sampleSplits(schema.min, schema.max, spec.count, schema.integer),
                ...specialValues,
            ]);
        case 'explicit':
            return uniqueSortedAscending(
                spec.values.map(value => {
                    if (typeof value === 'string' && Object.prototype.hasOwnProperty.call(special, value)) {
                        return special[value];
                    }
                    if (typeof value !== 'number') {
                        throw new InvalidSpecError(`Range values must be numbers, got ${JSON.stringify(value)}`);
                    }
                    if (specialValues.includes(value)) {
                        return value;
                    }
                    if (value < schema.min || value > schema.max) {
                        throw new InvalidSpecError(`${value} is outside [${schema.min}, ${schema.max}]`);
                    }
                    if (schema.integer && !Number.isInteger(value)) {
                        throw new InvalidSpecError(`${value} is not an integer`);
                    }

                    return value;
                }),
            );
    }
}
