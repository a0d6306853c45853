import { randomDecimal, randomElement, randomInt, uniqueInOrder } from '../../../../src/utils/data/data';

describe(randomInt.name, () => {
    test('returns the same number when min and max are equal', () => {
        expect(randomInt(5, 5)).toBe(5);
    });

    test.each([
        [0, 0],
        [1, 10],
        [-5, 5],
        [100, 200],
    ])('returns values in range [%d, %d]', (min, max) => {
        for (let i = 0; i < 100; i++) {
            const result = randomInt(min, max);
            expect(result).toBeGreaterThanOrEqual(min);
            expect(result).toBeLessThanOrEqual(max);
        }
    });

    test('maps the rng output onto the range', () => {
        expect(randomInt(1, 10, () => 0)).toBe(1);
        expect(randomInt(1, 10, () => 0.55)).toBe(6);
        expect(randomInt(1, 10, () => 0.999)).toBe(10);
    });
});

describe(randomDecimal.name, () => {
    test.each([
        [0.001, 0.004, 3],
        [1.5, 2.5, 2],
        [-5.5, -2.5, 2],
        [0, 1, 5],
    ])('returns a number between %f and %f with %d decimals', (min, max, decimals) => {
        const result = randomDecimal(min, max, decimals);

        expect(result).toBeGreaterThanOrEqual(min);
        expect(result).toBeLessThanOrEqual(max);
        expect(result.toString().split('.')[1]?.length ?? 0).toBeLessThanOrEqual(decimals);
    });

    test('rounds the rng output to the requested decimals', () => {
        expect(randomDecimal(0, 1, 2, () => 0.123456)).toBe(0.12);
    });
});

describe(randomElement.name, () => {
    test('picks the element the rng points at', () => {
        expect(randomElement(['a', 'b', 'c', 'd'], () => 0.5)).toBe('c');
    });

    test('throws for an empty array', () => {
        expect(() => randomElement([])).toThrow('Cannot pick a random element of an empty array');
    });
});

describe(uniqueInOrder.name, () => {
    test('drops repeated values and keeps the first occurrence order', () => {
        expect(uniqueInOrder(['hard', 'easy', 'hard', 'normal', 'easy'])).toEqual(['hard', 'easy', 'normal']);
    });
});
