import path from 'path';

import { generateDescriptors } from '@/lib/formats/vmt';
import type { ConversionReport, ProcessRunner } from '@/lib/formats/vtf/vtf-cmd';
import { convertFormat } from '@/lib/formats/vtf/vtf-cmd';

import { createPngSet } from './png-set-builder';
import type { PngSetResult } from './schemas';

export interface RoleAssetsOptions {
  image: string;
  nameShort: string;
  nameRaw: string;
  outDir: string;
  templateDir: string;
  skipVtf: boolean;
  vtfCmdPath?: string;
  runner?: ProcessRunner;
}

export interface RoleAssetsResult {
  nameRaw: string;
  outputDir: string;
  pngs: PngSetResult;
  conversion: ConversionReport;
  descriptors: string[];
}

export function getRoleOutputDir(outDir: string, nameShort: string): string {
  return path.join(outDir, 'converted', nameShort);
}

/**
 * PNG set first, then VTF conversion (it reads those PNGs), then the material files.
 */
export async function generateRoleAssets(options: RoleAssetsOptions): Promise<RoleAssetsResult> {
  const outputDir = getRoleOutputDir(options.outDir, options.nameShort);

  const pngs = await createPngSet(options.image, options.nameShort, outputDir, options.templateDir);
  const conversion = await convertFormat(outputDir, options.nameShort, options.skipVtf, {
    vtfCmdPath: options.vtfCmdPath,
    runner: options.runner,
  });
  const descriptors = await generateDescriptors(outputDir, options.nameShort);

  return {
    nameRaw: options.nameRaw,
    outputDir,
    pngs,
    conversion,
    descriptors,
  };
}
