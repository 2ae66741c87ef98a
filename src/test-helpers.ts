import fs from 'fs';
import fsExtra from 'fs-extra';
import os from 'os';
import path from 'path';
import sharp from 'sharp';

import type { RgbaImage } from '@/lib/formats/png';

export const RED = {
  r: 255, g: 0, b: 0, alpha: 1,
};
export const BLUE = {
  r: 0, g: 0, b: 255, alpha: 1,
};

export function solidPng(
  width: number,
  height: number,
  background: { r: number; g: number; b: number; alpha: number } = RED,
): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 4,
      background,
    },
  })
    .png()
    .toBuffer();
}

export async function writeSolidPng(
  filePath: string,
  width: number,
  height: number,
  background?: { r: number; g: number; b: number; alpha: number },
): Promise<string> {
  await fsExtra.ensureDir(path.dirname(filePath));
  await fsExtra.writeFile(filePath, await solidPng(width, height, background));
  return filePath;
}

export function pixelAt(image: RgbaImage, x: number, y: number): number[] {
  const i = (y * image.width + x) * 4;
  return [image.data[i], image.data[i + 1], image.data[i + 2], image.data[i + 3]];
}

export function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}
