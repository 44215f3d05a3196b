import { clampChannel } from '../types/color.js';
import { type PixelRule, TEXTURE_SIZE } from '../types/bitmap.js';
import { type ChannelBounds, type SpiralSpec } from '../types/pattern.js';

/** Frames per full turn of the phase. */
const PHASE_STEPS = 6;

function clampTo(value: number, [min, max]: ChannelBounds): number {
    return clampChannel(Math.max(min, Math.min(max, Math.trunc(value))));
}

/**
 * Swirling rings around the center. A radial sine and a three-armed angular
 * sine are summed and the channels clamped into the spec's bounds.
 * Draws no randomness.
 */
export function spiralRule(spec: SpiralSpec, frame: number, size: number = TEXTURE_SIZE): PixelRule {
    const phase = (frame * 2 * Math.PI) / PHASE_STEPS;
    const center = size / 2;
    const [rBounds, gBounds, bBounds] = spec.bounds;

    return (x, y) => {
        const dx = x - center;
        const dy = y - center;
        const dist = Math.sqrt(dx * dx + dy * dy);
        const angle = Math.atan2(dy, dx);

        const wave = Math.sin(dist * 0.8 + phase) * 50;
        const swirl = Math.sin(angle * 3 + phase) * 30;

        return [
            clampTo(128 + wave + swirl, rBounds),
            clampTo(wave / 3 + swirl / 2, gBounds),
            clampTo(200 + wave + swirl, bBounds),
        ];
    };
}
