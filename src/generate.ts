#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { runBatch, parseSeed, DEFAULT_OUTPUT_DIR } from './batch.js';
import { MATERIALS } from './materials.js';
import { type MaterialGroup } from './types/texture.js';

const GROUP_TITLES: Record<MaterialGroup, string> = {
  overworld: 'Overworld textures',
  animated: 'Animated textures',
  nether: 'Nether textures',
  special: 'Special materials',
  bonus: 'Bonus textures',
};

const USAGE = `Usage: generate-textures [output-dir] [--keep-existing] [--seed N] [--pattern P]

Writes every catalog texture as a 16x16 PNG into output-dir (default ${DEFAULT_OUTPUT_DIR}).`;

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'keep-existing': { type: 'boolean', default: false },
      seed: { type: 'string' },
      pattern: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  let seed: number | undefined;
  if (values.seed !== undefined) {
    seed = parseSeed(values.seed);
    if (seed === undefined) {
      console.error(`Invalid --seed "${values.seed}": expected an integer.\n`);
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }
  }
  const result = await runBatch({
    outputDir: positionals[0],
    overwrite: !values['keep-existing'],
    pattern: values.pattern,
    seed,
  });

  const written = new Set(result.written);
  let group: MaterialGroup | null = null;
  for (const material of MATERIALS) {
    if (material.group !== group) {
      group = material.group;
      console.log(`\n${GROUP_TITLES[group]}:`);
    }
    const slots = material.frameCount > 1
      ? Array.from({ length: material.frameCount }, (_, i) => `${material.name}_${String(i)}`)
      : [material.name];
    const marks = slots.map((slot) => (written.has(slot) ? slot : `${slot} (kept)`));
    console.log(`  ${marks.join(', ')}`);
  }

  console.log(`\n${String(result.written.length)} texture(s) written to ${result.directory}`);
  if (result.skipped.length > 0) {
    console.log(`${String(result.skipped.length)} existing texture(s) left untouched`);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
