import { type Color, rgb } from '../types/color.js';
import { type PixelRule } from '../types/bitmap.js';
import { type FlowSpec } from '../types/pattern.js';
import { type RandomSource, chance } from '../classes/random.js';

const FLOW_PERIOD = 12;

/**
 * Flow phase at (x, y) on the given frame, in [0, 1).
 */
export function flowValue(x: number, y: number, frame: number): number {
    return ((x * 3 + y * 7 + frame * 3) % FLOW_PERIOD) / FLOW_PERIOD;
}

/**
 * Maps a flow phase onto the molten color ramps:
 * yellow-orange below 0.3, orange-red below 0.7, deep red above.
 */
export function flowColor(flow: number): Color {
    if (flow < 0.3) {
        return rgb(255, 100 + Math.trunc(flow * 200), Math.trunc(flow * 50));
    }
    if (flow < 0.7) {
        return rgb(255, 180 - Math.trunc(flow * 100), 0);
    }
    return rgb(200 + Math.trunc(flow * 55), 80, 0);
}

export function flowRule(spec: FlowSpec, frame: number, rng: RandomSource): PixelRule {
    return (x, y) => {
        const color = flowColor(flowValue(x, y, frame));
        return chance(rng, spec.bubble.probability) ? spec.bubble.color : color;
    };
}
