import { type PixelRule } from '../types/bitmap.js';
import { type BrickSpec } from '../types/pattern.js';
import { type RandomSource } from '../classes/random.js';
import { perturb } from './noise.js';

/**
 * Returns true if (x, y) falls on a mortar joint.
 * Every other brick row is shifted by `stagger` so vertical joints alternate.
 */
export function isMortar(spec: BrickSpec, x: number, y: number): boolean {
    const offset = (Math.floor(y / spec.rowHeight) % 2) * spec.stagger;
    return (x + offset) % spec.gridSize === 0 || y % spec.rowHeight === 0;
}

/**
 * Brick and mortar grid. Both colors are perturbed independently.
 */
export function brickRule(spec: BrickSpec, rng: RandomSource): PixelRule {
    return (x, y) =>
        isMortar(spec, x, y)
            ? perturb(spec.mortar, spec.mortarAmplitude, rng)
            : perturb(spec.brick, spec.brickAmplitude, rng);
}
