import { type Color } from './color.js';

/**
 * Core types for texture bitmaps.
 *
 * A Bitmap is a fixed-size RGB raster. Pixels are stored row-major, three
 * bytes per pixel, so the byte offset of (x, y) is `(y * width + x) * 3`.
 */

/** Edge length of every texture produced by the synthesizer. */
export const TEXTURE_SIZE = 16;

export const BYTES_PER_PIXEL = 3;

export interface Bitmap {
    readonly width: number;
    readonly height: number;
    /** Row-major RGB bytes, `width * height * 3` long */
    readonly data: Uint8Array;
}

/**
 * A function that decides the color of a single pixel.
 * Rules may draw from a random source, so each coordinate must be asked once.
 */
export type PixelRule = (x: number, y: number) => Color;

/**
 * Builds a bitmap by evaluating `rule` exactly once for every coordinate,
 * rows outer and columns inner.
 */
export function renderBitmap(rule: PixelRule, width: number = TEXTURE_SIZE, height: number = TEXTURE_SIZE): Bitmap {
    const data = new Uint8Array(width * height * BYTES_PER_PIXEL);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const [r, g, b] = rule(x, y);
            const offset = (y * width + x) * BYTES_PER_PIXEL;
            data[offset] = r;
            data[offset + 1] = g;
            data[offset + 2] = b;
        }
    }
    return { width, height, data };
}

/**
 * Reads the color at (x, y). Throws if the coordinate lies outside the bitmap.
 */
export function getPixel(bitmap: Bitmap, x: number, y: number): Color {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) {
        throw new RangeError(`Pixel (${String(x)}, ${String(y)}) is outside the ${String(bitmap.width)}x${String(bitmap.height)} bitmap.`);
    }
    const offset = (y * bitmap.width + x) * BYTES_PER_PIXEL;
    return [bitmap.data[offset], bitmap.data[offset + 1], bitmap.data[offset + 2]];
}

/**
 * Returns the pixel data as nested rows of `[r, g, b]`, indexed `[y][x]`.
 */
export function toRows(bitmap: Bitmap): Color[][] {
    const rows: Color[][] = [];
    for (let y = 0; y < bitmap.height; y++) {
        const row: Color[] = [];
        for (let x = 0; x < bitmap.width; x++) {
            row.push(getPixel(bitmap, x, y));
        }
        rows.push(row);
    }
    return rows;
}
