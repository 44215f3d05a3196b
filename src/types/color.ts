/**
 * Core types for RGB colors.
 *
 * Textures are opaque, so a color is a plain RGB triple. Every arithmetic
 * helper here returns a new color with each channel clamped to 0-255.
 */

/**
 * An RGB color tuple.
 * Each channel is an integer between 0 and 255 (inclusive).
 */
export type Color = readonly [number, number, number];

/** A per-channel delta, applied with `offsetColor`. */
export type ChannelDelta = readonly [number, number, number];

export const CHANNEL_MIN = 0;
export const CHANNEL_MAX = 255;

/**
 * Clamps a single channel value into the valid 8-bit range.
 */
export function clampChannel(value: number): number {
    return Math.max(CHANNEL_MIN, Math.min(CHANNEL_MAX, value));
}

/**
 * Builds a color from raw channel values, clamping each.
 */
export function rgb(r: number, g: number, b: number): Color {
    return [clampChannel(r), clampChannel(g), clampChannel(b)];
}

/**
 * Adds the same scalar to all three channels. Negative deltas darken.
 */
export function shiftColor(color: Color, delta: number): Color {
    return rgb(color[0] + delta, color[1] + delta, color[2] + delta);
}

/**
 * Adds an independent delta to each channel.
 */
export function offsetColor(color: Color, delta: ChannelDelta): Color {
    return rgb(color[0] + delta[0], color[1] + delta[1], color[2] + delta[2]);
}

