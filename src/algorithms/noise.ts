import { type Color, shiftColor } from '../types/color.js';
import { type RandomSource, randomInt } from '../classes/random.js';

/**
 * Perturbs a color by one random scalar drawn from [-amount, amount].
 * The same offset is applied to all three channels, then each is clamped.
 *
 * @param color The base color.
 * @param amount Non-negative noise amplitude. 0 returns the color unchanged.
 * @param rng The random source; exactly one value is drawn per call.
 */
export function perturb(color: Color, amount: number, rng: RandomSource): Color {
    const noise = randomInt(rng, -amount, amount);
    return shiftColor(color, noise);
}
