import { type Color } from '../types/color.js';
import { getPixel } from '../types/bitmap.js';
import { type TextureSet } from '../types/texture.js';

const MISSING_A: Color = [255, 0, 255];
const MISSING_B: Color = [0, 0, 0];
const MISSING_CHECKS = 8;

/** Non-negative remainder, so negative UVs wrap instead of indexing backwards. */
function wrap(value: number, size: number): number {
    return ((value % size) + size) % size;
}

/**
 * Texel index of a texture coordinate with repeat wrapping. Only the
 * fractional part is scaled, so huge coordinates cannot overflow.
 */
function texel(coord: number, size: number): number {
    if (!Number.isFinite(coord)) {
        return 0;
    }
    const fraction = coord - Math.floor(coord);
    return Math.min(size - 1, Math.floor(fraction * size));
}

/**
 * Index of the frame shown `elapsedMs` after playback starts, looping.
 */
export function frameAt(set: TextureSet, elapsedMs: number): number {
    if (set.frames.length <= 1 || set.frameDurationMs <= 0 || !Number.isFinite(elapsedMs)) {
        return 0;
    }
    return wrap(Math.floor(elapsedMs / set.frameDurationMs), set.frames.length);
}

/**
 * Samples a texture set at UV coordinates with nearest-texel lookup and
 * repeat wrapping. A missing set samples as a magenta/black checkerboard.
 */
export function sampleTexture(set: TextureSet | undefined, u: number, v: number, elapsedMs: number = 0): Color {
    if (!set || set.frames.length === 0) {
        const checker = (texel(u, MISSING_CHECKS) + texel(v, MISSING_CHECKS)) % 2;
        return checker === 0 ? MISSING_A : MISSING_B;
    }

    const bitmap = set.frames[frameAt(set, elapsedMs)];
    const x = texel(u, bitmap.width);
    const y = texel(v, bitmap.height);
    return getPixel(bitmap, x, y);
}
