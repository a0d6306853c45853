import { RandomSource, randomDecimal, randomElement, randomInt, uniqueInOrder } from '@src/utils/data/data';

import { FallbackBehavior, OptionSchema, OptionValue, RangeOptionSchema } from './types';

const RANDOM_DECIMALS = 10;

/**
 * The schema's declared default, or the first choice / range minimum when it declares none.
 */
export function defaultValue(schema: OptionSchema): OptionValue {
    switch (schema.type) {
        case 'toggle':
        case 'text':
            return schema.default;
        case 'choice':
            return schema.default ?? schema.choices[0];
        case 'range':
        case 'named_range':
            return schema.default ?? schema.min;
    }
}

/**
 * Value of an option that is not enumerated.
 *
 * Choices are ordered by declaration for `minimum` and `maximum`.
 * `random` draws from Math.random unless an rng is given, so it is not reproducible across runs.
 */
export function fillFallback(
    schema: OptionSchema,
    behavior: FallbackBehavior,
    rng: RandomSource = Math.random,
): OptionValue {
    switch (behavior) {
        case 'default':
            return defaultValue(schema);
        case 'minimum':
            return boundaryValue(schema, 'minimum');
        case 'maximum':
            return boundaryValue(schema, 'maximum');
        case 'random':
            return randomValue(schema, rng);
    }
}

function boundaryValue(schema: OptionSchema, boundary: 'minimum' | 'maximum'): OptionValue {
    const isMin = boundary === 'minimum';

    switch (schema.type) {
        case 'toggle':
            return !isMin;
        case 'choice':
            return isMin ? schema.choices[0] : schema.choices[schema.choices.length - 1];
        case 'range':
        case 'named_range':
            return isMin ? schema.min : schema.max;
        case 'text':
            return schema.default;
    }
}

function randomValue(schema: OptionSchema, rng: RandomSource): OptionValue {
    switch (schema.type) {
        case 'toggle':
            return rng() < 0.5;
        case 'choice':
            return randomElement(schema.choices, rng);
        case 'range':
        case 'named_range':
            return randomRangeValue(schema, rng);
        case 'text':
            return schema.default;
    }
}

function randomRangeValue(schema: RangeOptionSchema, rng: RandomSource): number {
    if (!schema.integer) {
        return randomDecimal(schema.min, schema.max, RANDOM_DECIMALS, rng);
    }

    // every value of the domain once: the integers of the range, then the specials outside it
    const extraValues = uniqueInOrder(schema.type === 'named_range' ? Object.values(schema.special) : []).filter(
        value => !(Number.isInteger(value) && value >= schema.min && value <= schema.max),
    );
    const rangeSize = schema.max - schema.min + 1;
    const pick = randomInt(0, rangeSize + extraValues.length - 1, rng);

    return pick < rangeSize ? schema.min + pick : extraValues[pick - rangeSize];
}
