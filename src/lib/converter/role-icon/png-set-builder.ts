import chalk from 'chalk';
import fsExtra from 'fs-extra';
import path from 'path';

import type { RgbaImage } from '@/lib/formats/png';
import { createBlankCanvas, readRgba, writeRgbaPng } from '@/lib/formats/png';

import { getVariantFileBase, TAB_SPEC, VARIANT_SPECS } from './constants';
import {
  centerPlacement, loadSourceImage, pasteWithMask, resolveTemplatePath,
} from './icon-utils';
import { makeLayer } from './layer-compositor';
import type { PngSetEntry, PngSetResult, VariantSpec } from './schemas';

export interface ResolvedCanvas {
  canvas: RgbaImage;
  size: number;
  usedTemplate: boolean;
}

/**
 * Pick the base image for a variant.
 * Variants whose template is 'ignore' (score) or whose template file is missing get a blank
 * transparent square of the default size; otherwise the template's width becomes the working size.
 */
export async function resolveCanvas(spec: VariantSpec, templateDir: string): Promise<ResolvedCanvas> {
  const templatePath = resolveTemplatePath(spec, templateDir);

  if (templatePath && await fsExtra.pathExists(templatePath)) {
    const canvas = await readRgba(templatePath);
    return { canvas, size: canvas.width, usedTemplate: true };
  }

  return {
    canvas: createBlankCanvas(spec.defaultSize),
    size: spec.defaultSize,
    usedTemplate: false,
  };
}

/**
 * Write tab, score, sprite and icon PNGs for one namespace.
 * The source is read before anything is created, so a bad image leaves no output directory behind.
 */
export async function createPngSet(
  sourcePath: string,
  namespace: string,
  outputDir: string,
  templateDir: string,
): Promise<PngSetResult> {
  const source = await loadSourceImage(sourcePath);
  await fsExtra.ensureDir(outputDir);

  const files: PngSetEntry[] = [];

  const tab = await makeLayer(source, TAB_SPEC.defaultSize, TAB_SPEC.blurRadius, TAB_SPEC.shadowOffset, TAB_SPEC.margin);
  const tabPath = path.join(outputDir, `${getVariantFileBase('tab', namespace)}.png`);
  await writeRgbaPng(tab, tabPath);
  files.push({
    variant: 'tab', path: tabPath, width: tab.width, height: tab.height, usedTemplate: false,
  });

  for (const spec of VARIANT_SPECS) {
    const { canvas, size, usedTemplate } = await resolveCanvas(spec, templateDir);
    const layer = await makeLayer(source, size, spec.blurRadius, spec.shadowOffset, spec.margin);
    // placement uses the working size on both axes, templates are assumed square
    const at = centerPlacement({ width: size, height: size }, layer);
    const image = pasteWithMask(canvas, [{ image: layer, at }]);

    const outputPath = path.join(outputDir, `${getVariantFileBase(spec.name, namespace)}.png`);
    await writeRgbaPng(image, outputPath);
    files.push({
      variant: spec.name, path: outputPath, width: image.width, height: image.height, usedTemplate,
    });
  }

  for (const file of files) {
    const template = file.usedTemplate ? chalk.gray(' (template)') : '';
    console.log(`Wrote ${chalk.yellow(path.basename(file.path))} ${file.width}x${file.height}${template}`);
  }

  return { outputDir, files };
}
