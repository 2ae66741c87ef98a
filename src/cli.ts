#!/usr/bin/env tsx
import chalk from 'chalk';
import esMain from 'es-main';

import type { CliArgs } from '@/lib/cli-args';
import { parseCliArgs, USAGE } from '@/lib/cli-args';
import { generateRoleAssets } from '@/lib/converter/role-icon';
import { ValidationError } from '@/lib/errors';
import { getDefaultConfig } from '@/lib/global-config';

function parseOrReport(argv: string[]): CliArgs | null {
  try {
    return parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.error(USAGE);
      return null;
    }
    throw error;
  }
}

/**
 * Run the generator for one source icon.
 * @returns Process exit code; argument errors give 1 before anything is written
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseOrReport(argv);
  if (!args) return 1;

  const start = performance.now();
  const result = await generateRoleAssets({
    image: args.image,
    nameShort: args.nameShort,
    nameRaw: args.nameRaw,
    outDir: args.outDir,
    templateDir: args.templateDir ?? getDefaultConfig().templateDir,
    skipVtf: args.skipVtf,
  });

  console.log(`Generated assets for ${chalk.yellow(result.nameRaw)} in ${chalk.yellow(result.outputDir)}`);
  console.log(`  ${chalk.yellow(result.pngs.files.length)} PNGs, ${chalk.yellow(result.descriptors.length)} VMTs`);
  if (result.conversion.status === 'done') {
    console.log(`  ${chalk.yellow(result.conversion.converted.length)} VTFs, ${chalk.yellow(result.conversion.failed.length)} failed`);
  }
  console.log(`Done in ${chalk.yellow(((performance.now() - start) / 1000).toFixed(2))} s`);
  return 0;
}

if (esMain(import.meta)) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
