import fsExtra from 'fs-extra';
import path from 'path';
import sharp from 'sharp';

/**
 * Raw 8-bit RGBA pixels, row-major, 4 bytes per pixel.
 */
export interface RgbaImage {
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Get PNG image dimensions
 * @returns The width and height of the PNG image
 * @throws Error if image dimensions are invalid
 */
export async function getPngDimensions(png: string | Buffer): Promise<{ width: number; height: number }> {
  const metadata = await sharp(png).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Invalid image dimensions');
  }
  return { width: metadata.width, height: metadata.height };
}

export function rgbaToSharp(image: RgbaImage): sharp.Sharp {
  return sharp(image.data, {
    raw: {
      width: image.width,
      height: image.height,
      channels: 4,
    },
  });
}

/**
 * Decode anything sharp understands into raw RGBA.
 * Greyscale and palette inputs are expanded to sRGB first so the result always has 4 channels.
 */
export async function readRgba(input: string | Buffer | sharp.Sharp): Promise<RgbaImage> {
  const image = typeof input === 'string' || Buffer.isBuffer(input) ? sharp(input) : input;
  const { data, info } = await image
    .toColourspace('srgb')
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Expected 4 channels after RGBA conversion, got ${info.channels}`);
  }
  return { data, width: info.width, height: info.height };
}

export function createBlankCanvas(width: number, height: number = width): RgbaImage {
  return {
    data: Buffer.alloc(width * height * 4),
    width,
    height,
  };
}

export async function writeRgbaPng(image: RgbaImage, outputPath: string): Promise<void> {
  await fsExtra.ensureDir(path.dirname(outputPath));
  await rgbaToSharp(image).png().toFile(outputPath);
}
