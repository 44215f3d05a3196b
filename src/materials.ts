import { type MaterialDescriptor } from './types/texture.js';

/**
 * The material catalog, in batch order.
 *
 * Each entry is declarative: a pattern kind plus its colors, amplitudes and
 * override rules. Adding a material means adding an entry here.
 */
export const MATERIALS = [
    // ------------------------------------------------------------------------
    // overworld
    // ------------------------------------------------------------------------
    {
        name: 'grass_top',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [50, 180, 50],
            amplitude: 20,
            primary: { trigger: { kind: 'chance', probability: 0.15 }, rule: { kind: 'shift', delta: -30 } },
        },
    },
    {
        name: 'grass_side',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'banded',
            top: [50, 180, 50],
            topAmplitude: 15,
            bottom: [130, 80, 40],
            bottomAmplitude: 20,
            boundary: 4,
        },
    },
    {
        name: 'dirt',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [130, 80, 40],
            amplitude: 25,
            primary: { trigger: { kind: 'chance', probability: 0.05 }, rule: { kind: 'fixed', color: [90, 90, 90] } },
        },
    },
    {
        name: 'stone',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [100, 100, 100],
            amplitude: 30,
            primary: { trigger: { kind: 'chance', probability: 0.1 }, rule: { kind: 'shift', delta: -40 } },
            secondary: { combine: 'exclusive', trigger: { kind: 'chance', probability: 0.05 }, rule: { kind: 'shift', delta: 20 } },
        },
    },
    {
        name: 'wood',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'rings',
            variant: 'radial',
            base: [80, 50, 20],
            amplitude: 10,
            ringDarken: 15,
            radii: [2, 4, 6],
        },
    },
    {
        name: 'leaves',
        group: 'overworld',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [40, 120, 40],
            amplitude: 35,
            primary: { trigger: { kind: 'chance', probability: 0.15 }, rule: { kind: 'shift', delta: -25 } },
            secondary: { combine: 'exclusive', trigger: { kind: 'chance', probability: 0.1 }, rule: { kind: 'shift', delta: 30 } },
        },
    },

    // ------------------------------------------------------------------------
    // animated
    // ------------------------------------------------------------------------
    {
        name: 'water',
        group: 'animated',
        frameCount: 4,
        frameDurationMs: 300,
        spec: { pattern: 'wave', base: [30, 80, 200], speed: 2, period: 4, step: 8 },
    },
    {
        name: 'lava',
        group: 'animated',
        frameCount: 4,
        frameDurationMs: 200,
        spec: { pattern: 'flow', bubble: { probability: 0.05, color: [255, 200, 50] } },
    },
    {
        name: 'portal',
        group: 'animated',
        frameCount: 6,
        frameDurationMs: 150,
        spec: { pattern: 'spiral', bounds: [[80, 220], [0, 120], [150, 255]] },
    },

    // ------------------------------------------------------------------------
    // nether
    // ------------------------------------------------------------------------
    {
        name: 'netherrack',
        group: 'nether',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [150, 50, 50],
            amplitude: 40,
            primary: { trigger: { kind: 'mask', mask: { kind: 'linear', a: 1, b: 3, modulus: 7 } }, rule: { kind: 'shift', delta: -30 } },
        },
    },
    {
        name: 'nether_brick',
        group: 'nether',
        frameCount: 1,
        spec: {
            pattern: 'brick',
            brick: [50, 15, 15],
            brickAmplitude: 10,
            mortar: [20, 10, 10],
            mortarAmplitude: 5,
            gridSize: 8,
            rowHeight: 8,
            stagger: 0,
        },
    },
    {
        name: 'soul_sand',
        group: 'nether',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [70, 50, 35],
            amplitude: 20,
            primary: { trigger: { kind: 'chance', probability: 0.08 }, rule: { kind: 'shift', delta: -35 } },
        },
    },
    {
        name: 'glowstone',
        group: 'nether',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [255, 220, 100],
            amplitude: 20,
            primary: { trigger: { kind: 'mask', mask: { kind: 'linear', a: 1, b: 1, modulus: 3 } }, rule: { kind: 'shift', delta: 20 } },
        },
    },

    // ------------------------------------------------------------------------
    // special
    // ------------------------------------------------------------------------
    {
        name: 'diamond',
        group: 'special',
        frameCount: 1,
        spec: {
            pattern: 'facet',
            base: [180, 230, 255],
            amplitude: 20,
            brighten: 30,
            darken: 20,
            sparkle: { probability: 0.05, color: [255, 255, 255] },
        },
    },
    {
        name: 'emerald',
        group: 'special',
        frameCount: 1,
        spec: {
            pattern: 'facet',
            base: [50, 230, 80],
            amplitude: 25,
            brighten: 40,
            darken: 25,
            sparkle: { probability: 0.03, color: [150, 255, 180] },
        },
    },
    {
        name: 'obsidian',
        group: 'special',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [10, 5, 25],
            amplitude: 15,
            primary: { trigger: { kind: 'chance', probability: 0.08 }, rule: { kind: 'offset', delta: [15, 0, 40] } },
            secondary: { combine: 'stacked', trigger: { kind: 'chance', probability: 0.05 }, rule: { kind: 'shift', delta: 50 } },
        },
    },
    {
        name: 'ice',
        group: 'special',
        frameCount: 1,
        spec: { pattern: 'crack', base: [200, 230, 255], amplitude: 15, crackDarken: 40, highlightBrighten: 20 },
    },

    // ------------------------------------------------------------------------
    // bonus
    // ------------------------------------------------------------------------
    {
        name: 'brick',
        group: 'bonus',
        frameCount: 1,
        spec: {
            pattern: 'brick',
            brick: [150, 80, 60],
            brickAmplitude: 15,
            mortar: [180, 180, 180],
            mortarAmplitude: 10,
            gridSize: 8,
            rowHeight: 4,
            stagger: 4,
        },
    },
    {
        name: 'sand',
        group: 'bonus',
        frameCount: 1,
        spec: {
            pattern: 'speckle',
            base: [210, 180, 140],
            amplitude: 18,
            primary: { trigger: { kind: 'chance', probability: 0.03 }, rule: { kind: 'shift', delta: -40 } },
        },
    },
] as const satisfies readonly MaterialDescriptor[];

export type MaterialName = (typeof MATERIALS)[number]['name'];
