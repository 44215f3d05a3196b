import { type Bitmap } from './bitmap.js';
import { type PatternSpec } from './pattern.js';

/**
 * Core types for materials and their generated texture sets.
 */

/** Catalog grouping, used for ordering and console output. */
export type MaterialGroup = 'overworld' | 'animated' | 'nether' | 'special' | 'bonus';

/** Playback duration used for any frame whose material does not set one. */
export const DEFAULT_FRAME_DURATION_MS = 250;

/**
 * A Material is a named texture category with one pixel-generation rule.
 */
export interface MaterialDescriptor {
    name: string;
    group: MaterialGroup;
    /** 1 for static textures */
    frameCount: number;
    frameDurationMs?: number;
    spec: PatternSpec;
}

/**
 * A TextureSet is the ordered list of frames generated for one material.
 * Frames are generated independently; the index encodes playback order.
 */
export interface TextureSet {
    name: string;
    frames: Bitmap[];
    frameDurationMs: number;
}
