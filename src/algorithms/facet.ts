import { shiftColor } from '../types/color.js';
import { type PixelRule, TEXTURE_SIZE } from '../types/bitmap.js';
import { type FacetSpec } from '../types/pattern.js';
import { type RandomSource, chance } from '../classes/random.js';
import { perturb } from './noise.js';

/**
 * Facet tier of (x, y): 0, 1 or 2, from the Manhattan distance to the center.
 */
export function facetIndex(x: number, y: number, size: number = TEXTURE_SIZE): number {
    const center = size / 2;
    return Math.floor((Math.abs(x - center) + Math.abs(y - center)) * 2) % 3;
}

/**
 * Crystal facets: noise, then tier 0 brightens and tier 2 darkens.
 * A rare sparkle replaces the result outright.
 */
export function facetRule(spec: FacetSpec, rng: RandomSource): PixelRule {
    return (x, y) => {
        let color = perturb(spec.base, spec.amplitude, rng);

        const facet = facetIndex(x, y);
        if (facet === 0) {
            color = shiftColor(color, spec.brighten);
        } else if (facet === 2) {
            color = shiftColor(color, -spec.darken);
        }

        if (chance(rng, spec.sparkle.probability)) {
            color = spec.sparkle.color;
        }
        return color;
    };
}
