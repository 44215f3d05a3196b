import * as fs from 'fs/promises';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { type Bitmap, BYTES_PER_PIXEL } from '../types/bitmap.js';
import { DEFAULT_FRAME_DURATION_MS, type MaterialDescriptor, type TextureSet } from '../types/texture.js';
import { type OutputSink } from '../classes/texture-synthesizer.js';
import { DEFAULT_EXPORT_PATTERN, resolveExportPattern } from '../algorithms/export-pattern.js';
import * as errors from '../errors.js';

/** PNG color type 2: truecolor without alpha. */
const PNG_COLOR_TYPE_RGB = 2;

/**
 * Encodes a bitmap as an 8-bit RGB PNG.
 */
export function encodePng(bitmap: Bitmap): Buffer {
    const png = new PNG({ width: bitmap.width, height: bitmap.height });
    const pixelCount = bitmap.width * bitmap.height;
    for (let i = 0; i < pixelCount; i++) {
        png.data[i * 4] = bitmap.data[i * BYTES_PER_PIXEL];
        png.data[i * 4 + 1] = bitmap.data[i * BYTES_PER_PIXEL + 1];
        png.data[i * 4 + 2] = bitmap.data[i * BYTES_PER_PIXEL + 2];
        png.data[i * 4 + 3] = 255;
    }
    return PNG.sync.write(png, { colorType: PNG_COLOR_TYPE_RGB });
}

/**
 * Decodes a PNG into an RGB bitmap. Alpha is discarded.
 */
export function decodePng(buf: Buffer): Bitmap {
    const png = PNG.sync.read(buf);
    const pixelCount = png.width * png.height;
    const data = new Uint8Array(pixelCount * BYTES_PER_PIXEL);
    for (let i = 0; i < pixelCount; i++) {
        data[i * BYTES_PER_PIXEL] = png.data[i * 4];
        data[i * BYTES_PER_PIXEL + 1] = png.data[i * 4 + 1];
        data[i * BYTES_PER_PIXEL + 2] = png.data[i * 4 + 2];
    }
    return { width: png.width, height: png.height, data };
}

/**
 * Reads a texture PNG from disk.
 * Throws `cannotReadTexture` if the file is missing or not a valid PNG.
 */
export async function readTextureFile(filePath: string): Promise<Bitmap> {
    let buf: Buffer;
    try {
        buf = await fs.readFile(filePath);
    } catch {
        throw new Error(errors.cannotReadTexture(filePath).content[0].text);
    }
    try {
        return decodePng(buf);
    } catch {
        throw new Error(errors.cannotReadTexture(filePath).content[0].text);
    }
}

export interface PngDirectorySinkOptions {
    /** Replace files that already exist. When false they are reported as skipped. */
    overwrite?: boolean;
    /** File name pattern with `{name}` and `{frame}` tokens */
    pattern?: string;
}

/**
 * Output sink that writes each bitmap as a PNG into one directory.
 * Call `ensureDirectory()` once before the first `store`.
 */
export class PngDirectorySink implements OutputSink {
    readonly directory: string;
    private readonly overwrite: boolean;
    private readonly pattern: string;

    constructor(directory: string, options: PngDirectorySinkOptions = {}) {
        this.directory = path.resolve(directory);
        this.overwrite = options.overwrite ?? true;
        this.pattern = options.pattern ?? DEFAULT_EXPORT_PATTERN;
    }

    /**
     * Creates the output directory (and parents) if missing.
     */
    async ensureDirectory(): Promise<void> {
        try {
            await fs.mkdir(this.directory, { recursive: true });
        } catch {
            throw new Error(errors.cannotWritePath(this.directory).content[0].text);
        }
    }

    /**
     * Resolves the file path for a slot.
     */
    pathFor(materialName: string, frameIndex: number | null): string {
        return path.join(this.directory, resolveExportPattern(this.pattern, { name: materialName, frame: frameIndex }));
    }

    async store(materialName: string, frameIndex: number | null, bitmap: Bitmap): Promise<'written' | 'skipped'> {
        const filePath = this.pathFor(materialName, frameIndex);

        try {
            await fs.writeFile(filePath, encodePng(bitmap), { flag: this.overwrite ? 'w' : 'wx' });
        } catch (e: unknown) {
            if (!this.overwrite && isErrnoException(e) && e.code === 'EEXIST') {
                return 'skipped';
            }
            throw new Error(errors.cannotWritePath(filePath).content[0].text);
        }
        return 'written';
    }
}

/**
 * Loads a material's exported frames back from `directory`, named the way
 * `PngDirectorySink` names them with the same `pattern`.
 * Resolves to undefined when any frame file is absent; a file that exists but
 * does not decode throws `cannotReadTexture`.
 */
export async function readExportedSet(
    directory: string,
    material: MaterialDescriptor,
    pattern: string = DEFAULT_EXPORT_PATTERN,
): Promise<TextureSet | undefined> {
    const naming = new PngDirectorySink(directory, { pattern });
    const slots = material.frameCount > 1
        ? Array.from({ length: material.frameCount }, (_, i) => i)
        : [null];
    const paths = slots.map((frame) => naming.pathFor(material.name, frame));

    for (const filePath of paths) {
        if (!(await fileExists(filePath))) return undefined;
    }

    const frames = await Promise.all(paths.map((filePath) => readTextureFile(filePath)));
    return {
        name: material.name,
        frames,
        frameDurationMs: material.frameDurationMs ?? DEFAULT_FRAME_DURATION_MS,
    };
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}
