#!/usr/bin/env node
/**
 * Writes a target PDF to disk and prints its path.
 *
 * Usage: scope-target [--distance 100] [--unit yards] [--moa 0.25] [--paper letter]
 *                     [--aim diagonal] [--thickness 0.125] [--circles 3]
 *                     [--no-adjustment-text] [--color #000000] [--out .] [--log-level warn]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { TargetGenerator } from './core/TargetGenerator.js';
import { errorMessage } from './core/errors.js';
import { parseCliArgs } from './cli/args.js';

async function main(): Promise<void> {
  const invocation = parseCliArgs(process.argv.slice(2));
  const generator = new TargetGenerator({ logLevel: invocation.logLevel, theme: invocation.theme });

  const document = await generator.generate(invocation.options);

  await fs.mkdir(invocation.outDir, { recursive: true });
  const outputPath = path.join(invocation.outDir, document.filename);
  await fs.writeFile(outputPath, document.bytes);

  console.log(outputPath);
}

main().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
