/**
 * Uniform random source returning values in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Return a shuffled copy of `items` (Fisher-Yates over the whole array).
 * The input is left untouched.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
    const copy = [...items];

    for (let i = copy.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const swap = copy[i];
        copy[i] = copy[j];
        copy[j] = swap;
    }

    return copy;
}
