import { z } from 'zod';
import { TextureSynthesizer, type EmitReport } from './classes/texture-synthesizer.js';
import { SeededRandom, mathRandom } from './classes/random.js';
import { PngDirectorySink } from './io/texture-io.js';
import { DEFAULT_EXPORT_PATTERN } from './algorithms/export-pattern.js';

export const DEFAULT_OUTPUT_DIR = 'assets/textures';

/**
 * Options for one export run. Every field has a default.
 */
export const batchOptionsSchema = z.object({
    outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    overwrite: z.boolean().default(true),
    pattern: z.string().min(1).default(DEFAULT_EXPORT_PATTERN),
    materials: z.array(z.string().min(1)).optional(),
    seed: z.number().int().optional(),
});

export type BatchOptions = z.input<typeof batchOptionsSchema>;

export interface BatchResult extends EmitReport {
    directory: string;
}

/**
 * Parses a seed given as text. Undefined unless the text is a safe integer.
 */
export function parseSeed(text: string): number | undefined {
    const trimmed = text.trim();
    if (trimmed === '') return undefined;
    const seed = Number(trimmed);
    return Number.isSafeInteger(seed) ? seed : undefined;
}

/**
 * Generates the catalog (or the `materials` subset) and writes every slot as a
 * PNG into `outputDir`, creating the directory first.
 *
 * An explicit `seed` always wins and gets a fresh seeded synthesizer.
 * Otherwise `synth` is used when given, else one on the process-wide source.
 */
export async function runBatch(options: BatchOptions = {}, synth?: TextureSynthesizer): Promise<BatchResult> {
    const opts = batchOptionsSchema.parse(options);
    const source = opts.seed !== undefined
        ? new TextureSynthesizer(new SeededRandom(opts.seed))
        : synth ?? new TextureSynthesizer(mathRandom);
    const sink = new PngDirectorySink(opts.outputDir, { overwrite: opts.overwrite, pattern: opts.pattern });

    await sink.ensureDirectory();
    const report = await source.emit(sink, opts.materials);
    return { directory: sink.directory, ...report };
}
