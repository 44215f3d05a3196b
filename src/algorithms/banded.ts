import { type PixelRule } from '../types/bitmap.js';
import { type BandedSpec } from '../types/pattern.js';
import { type RandomSource } from '../classes/random.js';
import { perturb } from './noise.js';

/**
 * Two horizontal bands split at a fixed row. Rows above `boundary` use the
 * top color, the rest the bottom color; each band has its own amplitude.
 */
export function bandedRule(spec: BandedSpec, rng: RandomSource): PixelRule {
    return (_x, y) =>
        y < spec.boundary
            ? perturb(spec.top, spec.topAmplitude, rng)
            : perturb(spec.bottom, spec.bottomAmplitude, rng);
}
