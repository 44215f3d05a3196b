/**
 * Injectable random sources.
 *
 * Generators never touch `Math.random` directly; they draw from the source
 * they are handed, so tests can substitute a seeded or scripted one.
 */
export interface RandomSource {
    /** Returns a float in [0, 1). */
    next(): number;
}

/** The process-wide, unseeded source. */
export const mathRandom: RandomSource = {
    next: () => Math.random(),
};

/**
 * Deterministic 32-bit generator (mulberry32).
 * Two instances built from the same seed produce the same stream.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
        if (this.state === 0) {
            this.state = 0x6d2b79f5; // zero seed would start on a fixed point
        }
    }

    next(): number {
        let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
    }
}

/**
 * Draws a uniform integer from the closed interval [min, max].
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
    return min + Math.floor(rng.next() * (max - min + 1));
}

/**
 * Returns true with the given probability. Always consumes one draw.
 */
export function chance(rng: RandomSource, probability: number): boolean {
    return rng.next() < probability;
}
