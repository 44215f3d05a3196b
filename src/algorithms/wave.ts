import { rgb } from '../types/color.js';
import { type PixelRule } from '../types/bitmap.js';
import { type WaveSpec } from '../types/pattern.js';

/**
 * Brightness added at (x, y) on the given frame.
 */
export function waveOffset(spec: WaveSpec, x: number, y: number, frame: number): number {
    return ((x + frame * spec.speed + y) % spec.period) * spec.step;
}

/**
 * Diagonal bands that slide across the frames. Additive only, capped at 255.
 * Draws no randomness.
 */
export function waveRule(spec: WaveSpec, frame: number): PixelRule {
    return (x, y) => {
        const wave = waveOffset(spec, x, y, frame);
        return rgb(spec.base[0] + wave, spec.base[1] + wave, spec.base[2] + wave);
    };
}
