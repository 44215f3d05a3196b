import { type Bitmap, type PixelRule, renderBitmap } from '../types/bitmap.js';
import { type PatternSpec } from '../types/pattern.js';
import { DEFAULT_FRAME_DURATION_MS, type MaterialDescriptor, type TextureSet } from '../types/texture.js';
import { type RandomSource, mathRandom } from './random.js';
import { speckleRule } from '../algorithms/speckle.js';
import { bandedRule } from '../algorithms/banded.js';
import { ringsRule } from '../algorithms/rings.js';
import { brickRule } from '../algorithms/brick.js';
import { facetRule } from '../algorithms/facet.js';
import { waveRule } from '../algorithms/wave.js';
import { flowRule } from '../algorithms/flow.js';
import { spiralRule } from '../algorithms/spiral.js';
import { crackRule } from '../algorithms/crack.js';
import { MATERIALS } from '../materials.js';
import * as errors from '../errors.js';

/**
 * Anything that can persist one bitmap under a material name and optional frame index.
 */
export interface OutputSink {
    store(materialName: string, frameIndex: number | null, bitmap: Bitmap): Promise<'written' | 'skipped'>;
}

export interface EmitReport {
    written: string[];
    skipped: string[];
}

/**
 * Selects the pixel rule for one frame of a pattern.
 */
export function ruleFor(spec: PatternSpec, frame: number, rng: RandomSource): PixelRule {
    switch (spec.pattern) {
        case 'speckle':
            return speckleRule(spec, rng);
        case 'banded':
            return bandedRule(spec, rng);
        case 'rings':
            return ringsRule(spec, rng);
        case 'brick':
            return brickRule(spec, rng);
        case 'facet':
            return facetRule(spec, rng);
        case 'wave':
            return waveRule(spec, frame);
        case 'flow':
            return flowRule(spec, frame, rng);
        case 'spiral':
            return spiralRule(spec, frame);
        case 'crack':
            return crackRule(spec, rng);
    }
}

/**
 * Generates texture sets from a material catalog.
 * Holds no state between calls apart from the random source it draws from.
 */
export class TextureSynthesizer {
    private readonly catalog: ReadonlyMap<string, MaterialDescriptor>;

    constructor(
        private readonly rng: RandomSource = mathRandom,
        materials: readonly MaterialDescriptor[] = MATERIALS,
    ) {
        this.catalog = new Map(materials.map((m) => [m.name, m]));
    }

    /**
     * Returns the catalog in batch order.
     */
    list(): MaterialDescriptor[] {
        return [...this.catalog.values()];
    }

    has(name: string): boolean {
        return this.catalog.has(name);
    }

    /**
     * Looks up a material. Throws `materialNotFound` if the name is unknown.
     */
    get(name: string): MaterialDescriptor {
        const material = this.catalog.get(name);
        if (!material) {
            throw new Error(errors.materialNotFound(name).content[0].text);
        }
        return material;
    }

    /**
     * Generates one frame of a material.
     * Throws `frameOutOfRange` if the index is not below the material's frame count.
     */
    generateFrame(name: string, frameIndex: number): Bitmap {
        const material = this.get(name);
        if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex >= material.frameCount) {
            throw new Error(errors.frameOutOfRange(frameIndex, name, material.frameCount).content[0].text);
        }
        return renderBitmap(ruleFor(material.spec, frameIndex, this.rng));
    }

    /**
     * Generates every frame of a material, in order.
     */
    generate(name: string): TextureSet {
        const material = this.get(name);
        const frames: Bitmap[] = [];
        for (let frame = 0; frame < material.frameCount; frame++) {
            frames.push(renderBitmap(ruleFor(material.spec, frame, this.rng)));
        }
        return {
            name: material.name,
            frames,
            frameDurationMs: material.frameDurationMs ?? DEFAULT_FRAME_DURATION_MS,
        };
    }

    /**
     * Generates the named materials (all, by default) and hands each frame to the sink.
     * Static sets are stored with a null frame index. A sink failure stops the
     * batch; slots already stored stay stored.
     */
    async emit(sink: OutputSink, names?: readonly string[]): Promise<EmitReport> {
        const selected = names ? names.map((name) => this.get(name)) : this.list();
        const report: EmitReport = { written: [], skipped: [] };

        for (const material of selected) {
            const set = this.generate(material.name);
            const animated = material.frameCount > 1;
            for (const [index, bitmap] of set.frames.entries()) {
                const frameIndex = animated ? index : null;
                const outcome = await sink.store(material.name, frameIndex, bitmap);
                const slot = frameIndex === null ? material.name : `${material.name}_${String(frameIndex)}`;
                report[outcome].push(slot);
            }
        }

        return report;
    }
}
