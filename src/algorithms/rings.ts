import { shiftColor } from '../types/color.js';
import { type PixelRule, TEXTURE_SIZE } from '../types/bitmap.js';
import { type RingsSpec } from '../types/pattern.js';
import { type RandomSource } from '../classes/random.js';
import { perturb } from './noise.js';

/**
 * Pixel keys (`"x,y"`) on a circle outline, by the midpoint circle algorithm.
 * Octant symmetry produces duplicates on the axes and diagonals; the set drops them.
 */
export function circleOutline(cx: number, cy: number, radius: number): Set<string> {
    const keys = new Set<string>();
    const r = Math.round(Math.abs(radius));
    if (r === 0) {
        keys.add(`${String(cx)},${String(cy)}`);
        return keys;
    }

    const plot = (px: number, py: number) => {
        for (const [sx, sy] of [[px, py], [py, px]]) {
            keys.add(`${String(cx + sx)},${String(cy + sy)}`);
            keys.add(`${String(cx - sx)},${String(cy + sy)}`);
            keys.add(`${String(cx + sx)},${String(cy - sy)}`);
            keys.add(`${String(cx - sx)},${String(cy - sy)}`);
        }
    };

    let x = r;
    let y = 0;
    let err = 1 - r;
    while (y <= x) {
        plot(x, y);
        y++;
        if (err < 0) {
            err += 2 * y + 1;
        } else {
            x--;
            err += 2 * (y - x + 1);
        }
    }
    return keys;
}

/**
 * Ring index of (x, y) for the radial variant: alternates every half pixel
 * of distance from the center.
 */
export function ringIndex(x: number, y: number, size: number = TEXTURE_SIZE): number {
    const center = Math.floor(size / 2);
    const dist = Math.sqrt((x - center) ** 2 + (y - center) ** 2);
    return Math.floor(dist * 2) % 2;
}

/**
 * Wood grain.
 *
 * `radial` alternates the base and ring colors by ring index.
 * `outlines` fills with the base color and traces concentric circle outlines
 * in the ring color. Outline membership is computed up front, so each pixel
 * is still decided once.
 */
export function ringsRule(spec: RingsSpec, rng: RandomSource, size: number = TEXTURE_SIZE): PixelRule {
    const ringColor = shiftColor(spec.base, -spec.ringDarken);

    if (spec.variant === 'radial') {
        return (x, y) =>
            ringIndex(x, y, size) === 0
                ? perturb(spec.base, spec.amplitude, rng)
                : perturb(ringColor, spec.amplitude, rng);
    }

    const center = Math.floor(size / 2);
    const outline = new Set<string>();
    for (const radius of spec.radii) {
        for (const key of circleOutline(center, center, radius)) {
            outline.add(key);
        }
    }
    return (x, y) =>
        outline.has(`${String(x)},${String(y)}`)
            ? perturb(ringColor, spec.amplitude, rng)
            : perturb(spec.base, spec.amplitude, rng);
}
