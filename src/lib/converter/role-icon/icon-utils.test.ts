import fsExtra from 'fs-extra';
import path from 'path';
import {
  afterEach, beforeEach, describe, expect, it,
} from 'vitest';

import { ImageLoadError } from '@/lib/errors';
import { createBlankCanvas, readRgba } from '@/lib/formats/png';
import { makeTempDir, pixelAt, solidPng } from '@/test-helpers';

import { TAB_SPEC, VARIANT_SPECS } from './constants';
import {
  centerOffset, clipPaste, fitWithin, loadSourceImage, pasteWithMask, resolveTemplatePath,
} from './icon-utils';

describe('fitWithin', () => {
  it('shrinks square images to the box', () => {
    expect(fitWithin(512, 512, 16)).toEqual({ width: 16, height: 16 });
  });

  it('keeps the aspect ratio of wide images', () => {
    expect(fitWithin(40, 20, 16)).toEqual({ width: 16, height: 8 });
    expect(fitWithin(512, 256, 294)).toEqual({ width: 294, height: 147 });
  });

  it('never enlarges an image that already fits', () => {
    expect(fitWithin(10, 5, 16)).toEqual({ width: 10, height: 5 });
    expect(fitWithin(8, 8, 64)).toEqual({ width: 8, height: 8 });
  });

  it('keeps at least one pixel on the short side', () => {
    expect(fitWithin(1000, 1, 10)).toEqual({ width: 10, height: 1 });
  });
});

describe('centerOffset', () => {
  it('floors odd remainders', () => {
    expect(centerOffset(16, 8)).toBe(4);
    expect(centerOffset(16, 7)).toBe(4);
  });

  it('floors towards negative infinity for items larger than the container', () => {
    expect(centerOffset(5, 8)).toBe(-2);
  });
});

describe('clipPaste', () => {
  const target = { width: 256, height: 256 };

  it('returns the whole overlay when it fits', () => {
    expect(clipPaste(target, { width: 20, height: 20 }, { left: 10, top: 12 })).toEqual({
      left: 10,
      top: 12,
      crop: {
        left: 0, top: 0, width: 20, height: 20,
      },
    });
  });

  it('crops overlays hanging over an edge', () => {
    expect(clipPaste(target, { width: 20, height: 20 }, { left: 250, top: -5 })).toEqual({
      left: 250,
      top: 0,
      crop: {
        left: 0, top: 5, width: 6, height: 15,
      },
    });
  });

  it('returns null for overlays outside the target', () => {
    expect(clipPaste(target, { width: 20, height: 20 }, { left: 300, top: 0 })).toBeNull();
    expect(clipPaste(target, { width: 20, height: 20 }, { left: -20, top: 0 })).toBeNull();
  });
});

describe('pasteWithMask', () => {
  it('draws a clipped overlay and leaves the rest transparent', async () => {
    const base = createBlankCanvas(4);
    const overlay = await readRgba(await solidPng(2, 2));

    const result = pasteWithMask(base, [{ image: overlay, at: { left: 3, top: 3 } }]);

    expect(result.width).toBe(4);
    expect(result.height).toBe(4);
    expect(pixelAt(result, 3, 3)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(result, 2, 2)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(result, 2, 3)).toEqual([0, 0, 0, 0]);
  });

  it('returns an untouched copy when every overlay is outside', async () => {
    const base = createBlankCanvas(4);
    const overlay = await readRgba(await solidPng(2, 2));

    const result = pasteWithMask(base, [{ image: overlay, at: { left: 10, top: 0 } }]);

    expect(result.data.equals(base.data)).toBe(true);
    expect(result.data).not.toBe(base.data);
  });

  it('blends every band, alpha included, by the overlay alpha', () => {
    const base = createBlankCanvas(1);
    base.data.set([0, 0, 255, 255]);
    const overlay = { data: Buffer.from([255, 0, 0, 128]), width: 1, height: 1 };

    const onBlue = pasteWithMask(base, [{ image: overlay, at: { left: 0, top: 0 } }]);
    const onClear = pasteWithMask(createBlankCanvas(1), [{ image: overlay, at: { left: 0, top: 0 } }]);

    expect(pixelAt(onBlue, 0, 0)).toEqual([128, 0, 127, 191]);
    expect(pixelAt(onClear, 0, 0)).toEqual([128, 0, 0, 64]);
  });
});

describe('loadSourceImage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('icon-utils');
  });

  afterEach(async () => {
    await fsExtra.remove(dir);
  });

  it('returns the file contents of a decodable image', async () => {
    const png = await solidPng(3, 3);
    const file = path.join(dir, 'icon.png');
    await fsExtra.writeFile(file, png);

    expect((await loadSourceImage(file)).equals(png)).toBe(true);
  });

  it('raises ImageLoadError for missing files', async () => {
    await expect(loadSourceImage(path.join(dir, 'missing.png'))).rejects.toBeInstanceOf(ImageLoadError);
  });

  it('raises ImageLoadError for files that are not images', async () => {
    const file = path.join(dir, 'notes.png');
    await fsExtra.writeFile(file, 'not an image');

    await expect(loadSourceImage(file)).rejects.toBeInstanceOf(ImageLoadError);
  });
});

describe('resolveTemplatePath', () => {
  it('has no template for the tab and ignores the score template', () => {
    const score = VARIANT_SPECS.find((spec) => spec.name === 'score');

    expect(resolveTemplatePath(TAB_SPEC, '/templates')).toBeNull();
    expect(score && resolveTemplatePath(score, '/templates')).toBeNull();
  });

  it('joins the template file name onto the directory', () => {
    const sprite = VARIANT_SPECS.find((spec) => spec.name === 'sprite');

    expect(sprite && resolveTemplatePath(sprite, '/templates')).toBe(path.join('/templates', 'sprite_template.png'));
  });
});
