import { ImageLoadError } from '@/lib/errors';
import type { RgbaImage } from '@/lib/formats/png';
import { createBlankCanvas, readRgba, rgbaToSharp } from '@/lib/formats/png';

import { centerPlacement, fitWithin, pasteWithMask } from './icon-utils';

/**
 * Black silhouette of the icon's alpha channel, Gaussian-blurred with sigma `blurRadius`.
 * Keeps the icon's size; blur that spreads past the edges is cut off.
 */
export async function buildShadow(icon: RgbaImage, blurRadius: number): Promise<RgbaImage> {
  const silhouette = Buffer.alloc(icon.width * icon.height * 4);
  for (let i = 3; i < icon.data.length; i += 4) {
    silhouette[i] = icon.data[i];
  }

  const { data, info } = await rgbaToSharp({ data: silhouette, width: icon.width, height: icon.height })
    .blur(blurRadius)
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

async function decodeSource(source: string | Buffer): Promise<RgbaImage> {
  try {
    return await readRgba(source);
  } catch (error) {
    throw new ImageLoadError(typeof source === 'string' ? source : '<buffer>', error);
  }
}

/**
 * Build a transparent `canvasSize` × `canvasSize` layer with the icon thumbnailed to
 * `canvasSize - 2 * margin` and centred, on top of an optional drop shadow shifted
 * `shadowOffset` pixels right and down.
 * @throws ImageLoadError when the source cannot be decoded
 */
export async function makeLayer(
  source: string | Buffer,
  canvasSize: number,
  blurRadius: number,
  shadowOffset: number,
  margin: number,
): Promise<RgbaImage> {
  let icon = await decodeSource(source);

  const thumb = Math.max(canvasSize - 2 * margin, 1);
  const fitted = fitWithin(icon.width, icon.height, thumb);
  if (fitted.width !== icon.width || fitted.height !== icon.height) {
    icon = await readRgba(
      rgbaToSharp(icon).resize(fitted.width, fitted.height, {
        fit: 'fill',
        kernel: 'lanczos3',
      }),
    );
  }

  const layer = createBlankCanvas(canvasSize);
  const overlays: { image: RgbaImage; at: { left: number; top: number } }[] = [];

  if (blurRadius > 0) {
    const shadow = await buildShadow(icon, blurRadius);
    overlays.push({ image: shadow, at: centerPlacement(layer, shadow, shadowOffset) });
  }
  overlays.push({ image: icon, at: centerPlacement(layer, icon) });

  return pasteWithMask(layer, overlays);
}
