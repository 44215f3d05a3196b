import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { registerTextureTool } from './texture.js';
import { TextureSynthesizer } from '../classes/texture-synthesizer.js';
import { encodePng } from '../io/texture-io.js';
import { renderBitmap } from '../types/bitmap.js';
import * as batch from '../batch.js';

// Export writes to disk; the batch runner is covered by its own tests
vi.mock('../batch.js', () => ({
    runBatch: vi.fn(),
}));

type ToolResult = { isError?: boolean; content: Array<{ type: string; text: string }> };
type ToolCallback = (args: Record<string, unknown>) => Promise<ToolResult>;

function captureToolCallback(register: (server: never) => void): ToolCallback {
    let cb: ToolCallback | null = null;
    const mockServer = {
        registerTool(_name: string, _config: unknown, callback: ToolCallback) {
            cb = callback;
        },
    };
    register(mockServer as never);
    if (!cb) throw new Error('registerTool callback not captured');
    return cb;
}

function parse(result: ToolResult): Record<string, unknown> {
    return JSON.parse(result.content[0].text) as Record<string, unknown>;
}

describe('texture tool', () => {
    let handler: ToolCallback;
    let synth: TextureSynthesizer;

    beforeEach(() => {
        // Zero noise offset, every chance-based override misses
        synth = new TextureSynthesizer({ next: () => 0.5 });
        handler = captureToolCallback((server) => { registerTextureTool(server, synth); });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    // ─── list ────────────────────────────────────────────────────────

    it('list returns the catalog with frame counts', async () => {
        const result = await handler({ action: 'list' });

        expect(result.isError).toBeUndefined();
        const { materials } = parse(result) as { materials: Array<{ name: string; frames: number; pattern: string }> };
        expect(materials).toHaveLength(19);
        expect(materials[0]).toEqual({ name: 'grass_top', group: 'overworld', pattern: 'speckle', frames: 1 });
        expect(materials.find((m) => m.name === 'portal')).toMatchObject({ frames: 6, pattern: 'spiral' });
    });

    // ─── generate ────────────────────────────────────────────────────

    it('generate returns every frame as [y][x] rows', async () => {
        const result = await handler({ action: 'generate', material_name: 'water' });

        const body = parse(result) as { frames: number[][][][]; frame_duration_ms: number };
        expect(body.frame_duration_ms).toBe(300);
        expect(body.frames).toHaveLength(4);
        expect(body.frames[0]).toHaveLength(16);
        expect(body.frames[0][0][1]).toEqual([38, 88, 208]);
    });

    it('generate with frame_index returns one frame', async () => {
        const result = await handler({ action: 'generate', material_name: 'water', frame_index: 1 });

        const body = parse(result) as { pixels: number[][][]; frame_index: number };
        expect(body.frame_index).toBe(1);
        expect(body.pixels[0][0]).toEqual([46, 96, 216]);
    });

    it('generate without material_name returns error', async () => {
        const result = await handler({ action: 'generate' });

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain('material_name');
    });

    it('generate for an unknown material returns error', async () => {
        const result = await handler({ action: 'generate', material_name: 'marble' });

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain("Material 'marble'");
    });

    it('generate with a frame past the end returns error', async () => {
        const result = await handler({ action: 'generate', material_name: 'stone', frame_index: 1 });

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Frame 1 is out of range. Material 'stone' has 1 frame(s).");
    });

    // ─── export ──────────────────────────────────────────────────────

    it('export passes options to the batch runner', async () => {
        vi.mocked(batch.runBatch).mockResolvedValue({ directory: '/tmp/out', written: ['ice'], skipped: ['sand'] });

        const result = await handler({ action: 'export', output_dir: '/tmp/out', materials: ['ice', 'sand'], overwrite: false });

        expect(batch.runBatch).toHaveBeenCalledWith(
            {
                outputDir: '/tmp/out',
                materials: ['ice', 'sand'],
                overwrite: false,
                pattern: undefined,
                seed: undefined,
            },
            synth,
        );
        const body = parse(result);
        expect(body.message).toBe('Exported 1 texture(s) to /tmp/out.');
        expect(body.skipped).toEqual(['sand']);
    });

    it('export surfaces write failures', async () => {
        vi.mocked(batch.runBatch).mockRejectedValue(new Error('Cannot write to path: /readonly'));

        const result = await handler({ action: 'export', output_dir: '/readonly' });

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Cannot write to path: /readonly');
    });

    // ─── sample ──────────────────────────────────────────────────────

    it('sample reads the generated texture', async () => {
        await handler({ action: 'generate', material_name: 'water' });
        const result = await handler({ action: 'sample', material_name: 'water', u: 0.0625, v: 0, time_ms: 0 });

        expect(parse(result).color).toEqual([38, 88, 208]);
    });

    it('sample picks the frame for the elapsed time', async () => {
        // 300ms per frame -> frame 1 at 400ms
        const result = await handler({ action: 'sample', material_name: 'water', u: 0, v: 0, time_ms: 400 });

        expect(parse(result).color).toEqual([46, 96, 216]);
    });

    it('sample keeps huge coordinates in range', async () => {
        const result = await handler({ action: 'sample', material_name: 'water', u: 1e308, v: 0 });

        expect(result.isError).toBeUndefined();
        expect(parse(result).color).toEqual([30, 80, 200]);
    });

    describe('sample from exported files', () => {
        let tempDir: string;

        beforeEach(async () => {
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'texture-tool-'));
        });

        afterEach(async () => {
            await fs.rm(tempDir, { recursive: true, force: true });
        });

        it('reads the png in output_dir when it exists', async () => {
            await fs.writeFile(path.join(tempDir, 'stone.png'), encodePng(renderBitmap((x, y) => [x, y, 7])));

            const result = await handler({ action: 'sample', material_name: 'stone', u: 0.5, v: 0.25, output_dir: tempDir });

            expect(parse(result)).toMatchObject({ source: 'file', color: [8, 4, 7] });
        });

        it('picks the exported animation frame for the elapsed time', async () => {
            for (let i = 0; i < 4; i++) {
                await fs.writeFile(path.join(tempDir, `water_${String(i)}.png`), encodePng(renderBitmap(() => [i, 0, 0])));
            }

            // 300ms per frame -> frame 2 at 650ms
            const result = await handler({ action: 'sample', material_name: 'water', u: 0, v: 0, time_ms: 650, output_dir: tempDir });

            expect(parse(result)).toMatchObject({ source: 'file', color: [2, 0, 0] });
        });

        it('honours the export pattern', async () => {
            await fs.writeFile(path.join(tempDir, 'tex-ice.png'), encodePng(renderBitmap(() => [1, 2, 3])));

            const result = await handler({
                action: 'sample', material_name: 'ice', u: 0, v: 0, output_dir: tempDir, pattern: 'tex-{name}.png',
            });

            expect(parse(result)).toMatchObject({ source: 'file', color: [1, 2, 3] });
        });

        it('falls back to the generated texture when no file was exported', async () => {
            const result = await handler({ action: 'sample', material_name: 'water', u: 0.0625, v: 0, output_dir: tempDir });

            expect(parse(result)).toMatchObject({ source: 'generated', color: [38, 88, 208] });
        });

        it('returns error for an exported file that is not a png', async () => {
            await fs.writeFile(path.join(tempDir, 'sand.png'), 'not a png');

            const result = await handler({ action: 'sample', material_name: 'sand', u: 0, v: 0, output_dir: tempDir });

            expect(result.isError).toBe(true);
            expect(result.content[0].text).toContain('Cannot read texture file');
        });
    });

    it('sample without coordinates returns error', async () => {
        const result = await handler({ action: 'sample', material_name: 'water' });

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain('"u" and "v"');
    });

    it('sample for an unknown material returns error', async () => {
        const result = await handler({ action: 'sample', material_name: 'marble', u: 0, v: 0 });

        expect(result.isError).toBe(true);
    });
});
