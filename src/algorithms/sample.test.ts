import { describe, it, expect } from 'vitest';
import { frameAt, sampleTexture } from './sample.js';
import { renderBitmap } from '../types/bitmap.js';
import { type TextureSet } from '../types/texture.js';

function solidFrames(count: number): TextureSet {
    return {
        name: 'test',
        frames: Array.from({ length: count }, (_, i) => renderBitmap((x, y) => [x, y, i])),
        frameDurationMs: 100,
    };
}

describe('frameAt', () => {
    it('advances one frame per duration and loops', () => {
        const set = solidFrames(4);
        expect(frameAt(set, 0)).toBe(0);
        expect(frameAt(set, 99)).toBe(0);
        expect(frameAt(set, 100)).toBe(1);
        expect(frameAt(set, 350)).toBe(3);
        expect(frameAt(set, 400)).toBe(0);
    });

    it('stays in range for huge or infinite times', () => {
        const set = solidFrames(4);
        expect(frameAt(set, 1e308)).toBeGreaterThanOrEqual(0);
        expect(frameAt(set, 1e308)).toBeLessThan(4);
        expect(frameAt(set, Infinity)).toBe(0);
    });

    it('always returns 0 for a static set', () => {
        expect(frameAt(solidFrames(1), 12345)).toBe(0);
    });
});

describe('sampleTexture', () => {
    it('picks the nearest texel', () => {
        expect(sampleTexture(solidFrames(1), 0, 0)).toEqual([0, 0, 0]);
        expect(sampleTexture(solidFrames(1), 0.5, 0.25)).toEqual([8, 4, 0]);
        expect(sampleTexture(solidFrames(1), 0.999, 0.999)).toEqual([15, 15, 0]);
    });

    it('wraps coordinates outside [0, 1)', () => {
        expect(sampleTexture(solidFrames(1), 1.5, 2.25)).toEqual([8, 4, 0]);
        expect(sampleTexture(solidFrames(1), -0.0625, 0)).toEqual([15, 0, 0]);
    });

    it('keeps very large coordinates in range', () => {
        const set = solidFrames(1);
        expect(sampleTexture(set, 1e308, 0)).toEqual([0, 0, 0]);
        expect(sampleTexture(set, 0, -1e308)).toEqual([0, 0, 0]);
        expect(sampleTexture(set, 1e308, 0.5)).toEqual([0, 8, 0]);
    });

    it('treats infinite coordinates as the origin', () => {
        expect(sampleTexture(solidFrames(1), Infinity, -Infinity)).toEqual([0, 0, 0]);
    });

    it('samples the frame for the elapsed time', () => {
        expect(sampleTexture(solidFrames(4), 0, 0, 250)).toEqual([0, 0, 2]);
    });

    it('returns a checkerboard for a missing texture', () => {
        expect(sampleTexture(undefined, 0, 0)).toEqual([255, 0, 255]);
        expect(sampleTexture(undefined, 0.125, 0)).toEqual([0, 0, 0]);
        expect(sampleTexture(undefined, 0.125, 0.125)).toEqual([255, 0, 255]);
    });
});
