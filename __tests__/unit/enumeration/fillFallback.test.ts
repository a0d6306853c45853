import { defaultValue, fillFallback } from '../../../src/enumeration/fillFallback';
import { OptionSchema } from '../../../src/enumeration/types';
import {
    choiceSchema,
    namedRangeSchema,
    rangeSchema,
    textSchema,
    toggleSchema,
} from '../../__utils/schemas';

const fixedRng = (value: number) => () => value;

describe('defaultValue', () => {
    it.each<[string, OptionSchema, string | number | boolean]>([
        ['toggle', toggleSchema(true), true],
        ['choice with a default', choiceSchema(['easy', 'normal', 'hard'], 'normal'), 'normal'],
        ['choice without a default', choiceSchema(['easy', 'normal', 'hard']), 'easy'],
        ['range with a default', rangeSchema(0, 10, { default: 5 }), 5],
        ['range without a default', rangeSchema(3, 10), 3],
        ['text', textSchema('test-seed'), 'test-seed'],
    ])('should use the declared default of a %s', (_, schema, expected) => {
        expect(defaultValue(schema)).toBe(expected);
    });
});

describe('fillFallback', () => {
    describe('default', () => {
        it('should return the declared default', () => {
            expect(fillFallback(choiceSchema(['easy', 'normal', 'hard'], 'normal'), 'default')).toBe('normal');
            expect(fillFallback(rangeSchema(0, 10, { default: 5 }), 'default')).toBe(5);
        });
    });

    describe('minimum and maximum', () => {
        it.each<[string, OptionSchema, string | number | boolean, string | number | boolean]>([
            ['toggle', toggleSchema(true), false, true],
            ['choice', choiceSchema(['hard', 'easy', 'normal'], 'easy'), 'hard', 'normal'],
            ['range', rangeSchema(2, 8, { default: 5 }), 2, 8],
            ['named range', namedRangeSchema(1, 10, { none: 0, lots: 50 }), 1, 10],
            ['text', textSchema('test-seed'), 'test-seed', 'test-seed'],
        ])('should pick the boundaries of a %s', (_, schema, minimum, maximum) => {
            expect(fillFallback(schema, 'minimum')).toBe(minimum);
            expect(fillFallback(schema, 'maximum')).toBe(maximum);
        });
    });

    describe('random', () => {
        it('should draw a toggle from the rng', () => {
            expect(fillFallback(toggleSchema(), 'random', fixedRng(0.3))).toBe(true);
            expect(fillFallback(toggleSchema(), 'random', fixedRng(0.7))).toBe(false);
        });

        it('should draw one of the declared choices', () => {
            const schema = choiceSchema(['beat_boss', 'collect_gems', 'escape']);

            expect(fillFallback(schema, 'random', fixedRng(0))).toBe('beat_boss');
            expect(fillFallback(schema, 'random', fixedRng(0.5))).toBe('collect_gems');
            expect(fillFallback(schema, 'random', fixedRng(0.99))).toBe('escape');
        });

        it('should draw an integer within the range', () => {
            const schema = rangeSchema(0, 10);

            expect(fillFallback(schema, 'random', fixedRng(0))).toBe(0);
            expect(fillFallback(schema, 'random', fixedRng(0.5))).toBe(5);
            expect(fillFallback(schema, 'random', fixedRng(0.99))).toBe(10);
        });

        it('should give special values of a named range the same weight as the integers', () => {
            const schema = namedRangeSchema(1, 10, { none: 0, lots: 50 });

            expect(fillFallback(schema, 'random', fixedRng(0.5))).toBe(7);
            expect(fillFallback(schema, 'random', fixedRng(0.9))).toBe(0);
            expect(fillFallback(schema, 'random', fixedRng(0.99))).toBe(50);
        });

        it('should draw special values that fall inside the range only once', () => {
            const schema = namedRangeSchema(1, 10, { none: 0, ten: 10, nothing: 0 });

            // 11 values: 1..10 and 0
            expect(fillFallback(schema, 'random', fixedRng(0.9))).toBe(10);
            expect(fillFallback(schema, 'random', fixedRng(0.95))).toBe(0);
            expect(fillFallback(schema, 'random', fixedRng(0.99))).toBe(0);
        });

        it('should draw a decimal from a non-integer range', () => {
            expect(fillFallback(rangeSchema(0, 1, { integer: false }), 'random', fixedRng(0.25))).toBe(0.25);
        });

        it('should keep the default of a text option', () => {
            expect(fillFallback(textSchema('test-seed'), 'random', fixedRng(0.5))).toBe('test-seed');
        });

        it('should stay within the range with Math.random', () => {
            const schema = rangeSchema(-5, 5);

            for (let i = 0; i < 100; i++) {
                const value = fillFallback(schema, 'random');
                expect(typeof value).toBe('number');
                expect(value).toBeGreaterThanOrEqual(-5);
                expect(value).toBeLessThanOrEqual(5);
            }
        });
    });
});
