import { describe, it, expect } from 'vitest';
import { DEFAULT_EXPORT_PATTERN, resolveExportPattern } from './export-pattern.js';

describe('resolveExportPattern', () => {
    it('names animated frames with a suffix', () => {
        expect(resolveExportPattern(DEFAULT_EXPORT_PATTERN, { name: 'water', frame: 2 })).toBe('water_2.png');
    });

    it('keeps frame 0 as a value', () => {
        expect(resolveExportPattern(DEFAULT_EXPORT_PATTERN, { name: 'lava', frame: 0 })).toBe('lava_0.png');
    });

    it('drops the separator of a missing frame', () => {
        expect(resolveExportPattern(DEFAULT_EXPORT_PATTERN, { name: 'stone', frame: null })).toBe('stone.png');
        expect(resolveExportPattern(DEFAULT_EXPORT_PATTERN, { name: 'stone' })).toBe('stone.png');
    });

    it('zero-pads on request', () => {
        expect(resolveExportPattern('{name}-{frame:03}.png', { name: 'portal', frame: 5 })).toBe('portal-005.png');
    });

    it('drops a trailing separator when the first token is empty', () => {
        expect(resolveExportPattern('{group}_{name}.png', { name: 'ice' })).toBe('ice.png');
    });

    it('drops a leading dot separator but keeps the extension', () => {
        expect(resolveExportPattern('{name}.{frame}.png', { name: 'sand' })).toBe('sand.png');
    });

    it('handles consecutive empty tokens', () => {
        expect(resolveExportPattern('{name}_{group}_{frame}.png', { name: 'dirt' })).toBe('dirt.png');
    });

    it('leaves literal text untouched', () => {
        expect(resolveExportPattern('tex_{name}.png', { name: 'wood' })).toBe('tex_wood.png');
    });
});
