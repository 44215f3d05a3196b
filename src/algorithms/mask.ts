import { type PixelMask } from '../types/pattern.js';

/**
 * Tests whether (x, y) lies on a positional mask.
 * Negative remainders count as zero-hits, so `(x - y) mod 9` matches on
 * both sides of the diagonal.
 */
export function matchesMask(mask: PixelMask, x: number, y: number): boolean {
    switch (mask.kind) {
        case 'linear':
            return (mask.a * x + mask.b * y) % mask.modulus === 0;
        case 'product':
            return (x * y) % mask.modulus === 0;
    }
}
