import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TextureSynthesizer } from '../classes/texture-synthesizer.js';
import { type TextureSet } from '../types/texture.js';
import { toRows } from '../types/bitmap.js';
import { sampleTexture } from '../algorithms/sample.js';
import { runBatch } from '../batch.js';
import { readExportedSet } from '../io/texture-io.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `texture` tool.
 *
 * Actions: list, generate, export, sample
 */
const textureInputSchema = {
    action: z.enum(['list', 'generate', 'export', 'sample']).describe('Texture action to perform'),
    material_name: z.string().optional().describe('Material name (required for generate and sample)'),
    frame_index: z.number().int().optional().describe('For generate: a single frame of an animated material'),
    output_dir: z
        .string()
        .optional()
        .describe('For export: destination directory (default assets/textures). For sample: read the exported PNGs from here when present'),
    materials: z.array(z.string()).optional().describe('For export: subset of materials to write (default all)'),
    overwrite: z.boolean().optional().describe('For export: replace existing files (default true)'),
    pattern: z.string().optional().describe('For export and sample: file name pattern with {name} and {frame} tokens'),
    seed: z.number().int().optional().describe('For export: seed for a reproducible run'),
    u: z.number().finite().optional().describe('For sample: horizontal texture coordinate, wraps outside [0, 1)'),
    v: z.number().finite().optional().describe('For sample: vertical texture coordinate, wraps outside [0, 1)'),
    time_ms: z.number().finite().optional().describe('For sample: elapsed playback time selecting the animation frame'),
};

type TextureArgs = z.infer<z.ZodObject<typeof textureInputSchema>>;

function ok(payload: unknown) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(payload) }] };
}

/**
 * Registers the `texture` tool on the MCP server.
 *
 * Sets produced by `generate` are kept for the session, so `sample` reads the
 * same pixels the client was shown. Given `output_dir`, `sample` reads the
 * exported PNGs instead when they are all there.
 */
export function registerTextureTool(server: McpServer, synth: TextureSynthesizer = new TextureSynthesizer()): void {
    const generated = new Map<string, TextureSet>();

    server.registerTool(
        'texture',
        {
            title: 'Texture',
            description:
                'Procedural 16x16 texture synthesis. List materials, generate pixel data, export PNG files, or sample a texture at UV coordinates.',
            inputSchema: textureInputSchema,
        },
        async (args) => {
            switch (args.action) {
                case 'list':
                    return handleList(synth);
                case 'generate':
                    return handleGenerate(synth, generated, args.material_name, args.frame_index);
                case 'export':
                    return handleExport(synth, args);
                case 'sample':
                    return handleSample(synth, generated, args);
                default:
                    return errors.invalidArgument(`Unknown texture action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleList(synth: TextureSynthesizer) {
    return ok({
        materials: synth.list().map((m) => ({
            name: m.name,
            group: m.group,
            pattern: m.spec.pattern,
            frames: m.frameCount,
        })),
    });
}

function handleGenerate(
    synth: TextureSynthesizer,
    generated: Map<string, TextureSet>,
    name: string | undefined,
    frameIndex: number | undefined,
) {
    if (!name) return errors.invalidArgument('texture generate requires "material_name".');
    if (!synth.has(name)) return errors.materialNotFound(name);

    try {
        if (frameIndex !== undefined) {
            const bitmap = synth.generateFrame(name, frameIndex);
            return ok({ name, frame_index: frameIndex, width: bitmap.width, height: bitmap.height, pixels: toRows(bitmap) });
        }

        const set = synth.generate(name);
        generated.set(name, set);
        return ok({
            name,
            frame_duration_ms: set.frameDurationMs,
            frames: set.frames.map((bitmap) => toRows(bitmap)),
        });
    } catch (e: unknown) {
        return errors.domainError(e instanceof Error ? e.message : String(e));
    }
}

async function handleExport(synth: TextureSynthesizer, args: TextureArgs) {
    try {
        const result = await runBatch(
            {
                outputDir: args.output_dir,
                materials: args.materials,
                overwrite: args.overwrite,
                pattern: args.pattern,
                seed: args.seed,
            },
            synth,
        );
        return ok({
            message: `Exported ${String(result.written.length)} texture(s) to ${result.directory}.`,
            directory: result.directory,
            written: result.written,
            skipped: result.skipped,
        });
    } catch (e: unknown) {
        return errors.domainError(e instanceof Error ? e.message : String(e));
    }
}

async function handleSample(synth: TextureSynthesizer, generated: Map<string, TextureSet>, args: TextureArgs) {
    const name = args.material_name;
    if (!name) return errors.invalidArgument('texture sample requires "material_name".');
    if (args.u === undefined || args.v === undefined) {
        return errors.invalidArgument('texture sample requires "u" and "v".');
    }
    if (!synth.has(name)) return errors.materialNotFound(name);

    let set: TextureSet | undefined;
    let source: 'file' | 'generated' = 'generated';
    if (args.output_dir) {
        try {
            set = await readExportedSet(args.output_dir, synth.get(name), args.pattern);
        } catch (e: unknown) {
            return errors.domainError(e instanceof Error ? e.message : String(e));
        }
        if (set) source = 'file';
    }

    if (!set) set = generated.get(name);
    if (!set) {
        set = synth.generate(name);
        generated.set(name, set);
    }

    const color = sampleTexture(set, args.u, args.v, args.time_ms ?? 0);
    return ok({ name, u: args.u, v: args.v, source, color });
}
