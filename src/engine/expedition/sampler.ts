import seedrandom from 'seedrandom';

/**
 * Seeded draws without replacement.
 * Deterministic for a given seed, so every attempt can be replayed.
 */
export class SeededSampler {
    private rng: seedrandom.PRNG;

    constructor(seed: number) {
        this.rng = seedrandom(String(seed));
    }

    /**
     * Draw k distinct items (partial Fisher-Yates over a copy).
     * One generator call per drawn item; the input is never reordered.
     */
    sample<T>(pool: readonly T[], k: number): T[] {
        if (!Number.isInteger(k) || k < 0) {
            throw new RangeError(`Sample size must be a non-negative integer, got ${k}`);
        }
        if (k > pool.length) {
            throw new RangeError(`Cannot draw ${k} items from a pool of ${pool.length}`);
        }

        const items = [...pool];
        for (let i = 0; i < k; i++) {
            const j = i + Math.floor(this.rng() * (items.length - i));
            const chosen = items[j];
            items[j] = items[i];
            items[i] = chosen;
        }
        return items.slice(0, k);
    }

    pick<T>(pool: readonly T[]): T {
        const [item] = this.sample(pool, 1);
        return item;
    }
}

/**
 * Next seed in an attempt chain: a uint32 drawn from a generator seeded with the previous seed.
 */
export function deriveAttemptSeed(previous: number): number {
    return seedrandom(String(previous)).int32() >>> 0;
}
