import { type ChannelDelta, type Color } from './color.js';

/**
 * Declarative pattern descriptors.
 *
 * Each material in the catalog names one pattern kind and supplies its
 * parameters. The discriminant is the `pattern` key.
 */

// ----------------------------------------------------------------------------
// Positional masks
// ----------------------------------------------------------------------------

/** Matches pixels where `(a * x + b * y) mod modulus == 0`. */
export interface LinearMask {
    kind: 'linear';
    a: number;
    b: number;
    modulus: number;
}

/** Matches pixels where `(x * y) mod modulus == 0`. */
export interface ProductMask {
    kind: 'product';
    modulus: number;
}

export type PixelMask = LinearMask | ProductMask;

// ----------------------------------------------------------------------------
// Overrides
// ----------------------------------------------------------------------------

export type OverrideTrigger =
    | { kind: 'chance'; probability: number }
    | { kind: 'mask'; mask: PixelMask };

export type OverrideRule =
    | { kind: 'shift'; delta: number }
    | { kind: 'offset'; delta: ChannelDelta }
    | { kind: 'fixed'; color: Color };

export interface Override {
    trigger: OverrideTrigger;
    rule: OverrideRule;
}

/**
 * A secondary override either runs only when the primary did not fire
 * (`exclusive`) or always runs after it (`stacked`).
 */
export interface SecondaryOverride extends Override {
    combine: 'exclusive' | 'stacked';
}

// ----------------------------------------------------------------------------
// Pattern specs
// ----------------------------------------------------------------------------

export interface SpeckleSpec {
    pattern: 'speckle';
    base: Color;
    amplitude: number;
    primary?: Override;
    secondary?: SecondaryOverride;
}

export interface BandedSpec {
    pattern: 'banded';
    top: Color;
    topAmplitude: number;
    bottom: Color;
    bottomAmplitude: number;
    /** First row that belongs to the bottom band */
    boundary: number;
}

export type RingVariant = 'radial' | 'outlines';

export interface RingsSpec {
    pattern: 'rings';
    variant: RingVariant;
    base: Color;
    amplitude: number;
    /** Subtracted from every channel of `base` to get the ring color */
    ringDarken: number;
    /** Outline radii, used by the `outlines` variant only */
    radii: readonly number[];
}

export interface BrickSpec {
    pattern: 'brick';
    brick: Color;
    brickAmplitude: number;
    mortar: Color;
    mortarAmplitude: number;
    gridSize: number;
    rowHeight: number;
    /** Horizontal shift applied to every other brick row */
    stagger: number;
}

export interface FacetSpec {
    pattern: 'facet';
    base: Color;
    amplitude: number;
    brighten: number;
    darken: number;
    sparkle: { probability: number; color: Color };
}

export interface WaveSpec {
    pattern: 'wave';
    base: Color;
    /** Columns the wave advances per frame */
    speed: number;
    period: number;
    step: number;
}

export interface FlowSpec {
    pattern: 'flow';
    bubble: { probability: number; color: Color };
}

export type ChannelBounds = readonly [min: number, max: number];

export interface SpiralSpec {
    pattern: 'spiral';
    /** Per-channel clamp ranges that keep the palette in one hue band */
    bounds: readonly [ChannelBounds, ChannelBounds, ChannelBounds];
}

export interface CrackSpec {
    pattern: 'crack';
    base: Color;
    amplitude: number;
    crackDarken: number;
    highlightBrighten: number;
}

export type PatternSpec =
    | SpeckleSpec
    | BandedSpec
    | RingsSpec
    | BrickSpec
    | FacetSpec
    | WaveSpec
    | FlowSpec
    | SpiralSpec
    | CrackSpec;

export type PatternKind = PatternSpec['pattern'];
