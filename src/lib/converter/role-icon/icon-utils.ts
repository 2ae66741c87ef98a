import fsExtra from 'fs-extra';
import path from 'path';
import sharp from 'sharp';

import { ImageLoadError } from '@/lib/errors';
import type { RgbaImage } from '@/lib/formats/png';

import type { VariantSpec } from './schemas';

export interface Placement {
  left: number;
  top: number;
}

/**
 * Overlapping part of an overlay drawn at (x, y) on a target.
 * `crop` is in overlay coordinates, `left`/`top` in target coordinates.
 */
export interface PasteRegion {
  left: number;
  top: number;
  crop: { left: number; top: number; width: number; height: number };
}

/**
 * Size of a thumbnail that fits inside a `target` × `target` box while keeping the aspect ratio.
 * Images that already fit are left alone, nothing is enlarged.
 */
export function fitWithin(
  width: number,
  height: number,
  target: number,
): { width: number; height: number } {
  if (width <= target && height <= target) {
    return { width, height };
  }
  const scale = Math.min(target / width, target / height);
  return {
    width: Math.min(target, Math.max(1, Math.round(width * scale))),
    height: Math.min(target, Math.max(1, Math.round(height * scale))),
  };
}

export function centerOffset(containerSize: number, itemSize: number): number {
  return Math.floor((containerSize - itemSize) / 2);
}

export function centerPlacement(
  container: { width: number; height: number },
  item: { width: number; height: number },
  offset = 0,
): Placement {
  return {
    left: centerOffset(container.width, item.width) + offset,
    top: centerOffset(container.height, item.height) + offset,
  };
}

export function clipPaste(
  target: { width: number; height: number },
  overlay: { width: number; height: number },
  at: Placement,
): PasteRegion | null {
  const left = Math.max(0, at.left);
  const top = Math.max(0, at.top);
  const right = Math.min(target.width, at.left + overlay.width);
  const bottom = Math.min(target.height, at.top + overlay.height);

  if (right <= left || bottom <= top) {
    return null;
  }

  return {
    left,
    top,
    crop: {
      left: left - at.left,
      top: top - at.top,
      width: right - left,
      height: bottom - top,
    },
  };
}

/**
 * Paste overlays onto a copy of the base in order, each using its own alpha as the mask.
 * Every band, alpha included, becomes `src * m + dst * (1 - m)`.
 * Overlays are clipped to the base; ones that fall entirely outside are dropped.
 */
export function pasteWithMask(
  base: RgbaImage,
  overlays: { image: RgbaImage; at: Placement }[],
): RgbaImage {
  const data = Buffer.from(base.data);

  for (const { image, at } of overlays) {
    const region = clipPaste(base, image, at);
    if (!region) continue;

    for (let y = 0; y < region.crop.height; y++) {
      for (let x = 0; x < region.crop.width; x++) {
        const src = ((region.crop.top + y) * image.width + region.crop.left + x) * 4;
        const dst = ((region.top + y) * base.width + region.left + x) * 4;
        const mask = image.data[src + 3];
        if (mask === 0) continue;

        for (let c = 0; c < 4; c++) {
          data[dst + c] = Math.round((image.data[src + c] * mask + data[dst + c] * (255 - mask)) / 255);
        }
      }
    }
  }

  return { data, width: base.width, height: base.height };
}

/**
 * Read the source icon into memory and make sure sharp can decode it.
 */
export async function loadSourceImage(imagePath: string): Promise<Buffer> {
  try {
    const buffer = await fsExtra.readFile(imagePath);
    const metadata = await sharp(buffer).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('Invalid image dimensions');
    }
    return buffer;
  } catch (error) {
    throw new ImageLoadError(imagePath, error);
  }
}

/**
 * Resolve the template file for a variant, or null when it has none or ignores it
 */
export function resolveTemplatePath(spec: VariantSpec, templateDir: string): string | null {
  if (spec.template === 'none' || spec.template === 'ignore') {
    return null;
  }
  return path.join(templateDir, spec.template);
}
