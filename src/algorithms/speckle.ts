import { type Color, offsetColor, shiftColor } from '../types/color.js';
import { type PixelRule } from '../types/bitmap.js';
import { type Override, type OverrideRule, type SpeckleSpec } from '../types/pattern.js';
import { type RandomSource, chance } from '../classes/random.js';
import { perturb } from './noise.js';
import { matchesMask } from './mask.js';

/**
 * Applies an override rule to an already-perturbed color.
 */
export function applyOverrideRule(color: Color, rule: OverrideRule): Color {
    switch (rule.kind) {
        case 'shift':
            return shiftColor(color, rule.delta);
        case 'offset':
            return offsetColor(color, rule.delta);
        case 'fixed':
            return rule.color;
    }
}

/**
 * Decides whether an override fires at (x, y).
 * Chance triggers consume one draw; mask triggers consume none.
 */
export function overrideFires(override: Override, x: number, y: number, rng: RandomSource): boolean {
    const trigger = override.trigger;
    if (trigger.kind === 'chance') {
        return chance(rng, trigger.probability);
    }
    return matchesMask(trigger.mask, x, y);
}

/**
 * Uniform noise fill with optional speckle overrides.
 *
 * Every pixel starts as `perturb(base, amplitude)`. The primary override is
 * tried next; the secondary is tried either only when the primary missed
 * (`exclusive`, an else-if chain) or unconditionally after it (`stacked`).
 */
export function speckleRule(spec: SpeckleSpec, rng: RandomSource): PixelRule {
    return (x, y) => {
        let color = perturb(spec.base, spec.amplitude, rng);

        let primaryFired = false;
        if (spec.primary && overrideFires(spec.primary, x, y, rng)) {
            color = applyOverrideRule(color, spec.primary.rule);
            primaryFired = true;
        }

        const secondary = spec.secondary;
        if (secondary && !(secondary.combine === 'exclusive' && primaryFired)) {
            if (overrideFires(secondary, x, y, rng)) {
                color = applyOverrideRule(color, secondary.rule);
            }
        }

        return color;
    };
}
