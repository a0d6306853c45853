export type RandomSource = () => number;

export function randomDecimal(min: number, max: number, decimals: number, rng: RandomSource = Math.random): number {
    const factor = Math.pow(10, decimals);

    return Math.round((rng() * (max - min) + min) * factor) / factor;
}

export function randomInt(min: number, max: number, rng: RandomSource = Math.random): number {
    return Math.floor(rng() * (max - min + 1)) + min;
}

export function randomElement<T>(values: readonly T[], rng: RandomSource = Math.random): T {
    if (values.length === 0) {
        throw new Error('Cannot pick a random element of an empty array');
    }

    return values[randomInt(0, values.length - 1, rng)];
}

export function uniqueInOrder<T>(values: readonly T[]): T[] {
    return [...new Set(values)];
}
