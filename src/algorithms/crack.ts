import { shiftColor } from '../types/color.js';
import { type PixelRule } from '../types/bitmap.js';
import { type CrackSpec, type PixelMask } from '../types/pattern.js';
import { type RandomSource } from '../classes/random.js';
import { perturb } from './noise.js';
import { matchesMask } from './mask.js';

const CRACK_LINES: readonly PixelMask[] = [
    { kind: 'linear', a: 1, b: 1, modulus: 7 },
    { kind: 'linear', a: 1, b: -1, modulus: 9 },
];

const HIGHLIGHT: PixelMask = { kind: 'product', modulus: 5 };

export function isCrack(x: number, y: number): boolean {
    return CRACK_LINES.some((mask) => matchesMask(mask, x, y));
}

export function isHighlight(x: number, y: number): boolean {
    return matchesMask(HIGHLIGHT, x, y);
}

/**
 * Noise fill crossed by two diagonal crack families, then a sparse highlight
 * layer. The highlight is applied last.
 */
export function crackRule(spec: CrackSpec, rng: RandomSource): PixelRule {
    return (x, y) => {
        let color = perturb(spec.base, spec.amplitude, rng);
        if (isCrack(x, y)) {
            color = shiftColor(color, -spec.crackDarken);
        }
        if (isHighlight(x, y)) {
            color = shiftColor(color, spec.highlightBrighten);
        }
        return color;
    };
}
