import fsExtra from 'fs-extra';
import path from 'path';
import {
  afterEach, beforeEach, describe, expect, it,
} from 'vitest';

import { makeTempDir } from '@/test-helpers';

import { generateDescriptors, getRoleDescriptors, renderVmt } from './vmt';

const SPRITE_VMT = [
  '"UnlitGeneric"',
  '{',
  '\t"$basetexture" "vgui/ttt/roles/jester/sprite_jester"',
  '\t$nocull 1',
  '\t$nodecal 1',
  '\t$nolod 1',
  '\t$vertexcolor 1',
  '\t$vertexalpha 1',
  '\t$translucent 1',
  '}',
  '',
].join('\n');

const SPRITE_NOZ_VMT = [
  '"UnlitGeneric"',
  '{',
  '\t"$basetexture" "vgui/ttt/roles/jester/sprite_jester"',
  '\t$nocull 1',
  '\t$ignorez 1',
  '\t$nodecal 1',
  '\t$nolod 1',
  '\t$vertexcolor 1',
  '\t$vertexalpha 1',
  '\t$translucent 1',
  '}',
  '',
].join('\n');

describe('renderVmt', () => {
  it('renders the sprite, sprite_noz and icon materials', () => {
    const [sprite, spriteNoz, icon] = getRoleDescriptors('jester');

    expect(renderVmt(sprite, 'jester')).toBe(SPRITE_VMT);
    expect(renderVmt(spriteNoz, 'jester')).toBe(SPRITE_NOZ_VMT);
    expect(renderVmt(icon, 'jester')).toBe(SPRITE_VMT.replace('sprite_jester', 'icon_jester'));
  });

  it('accepts another material base path', () => {
    const [sprite] = getRoleDescriptors('jester');

    expect(renderVmt(sprite, 'jester', 'vgui/custom').split('\n')[2])
      .toBe('\t"$basetexture" "vgui/custom/jester/sprite_jester"');
  });
});

describe('generateDescriptors', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('vmt');
  });

  afterEach(async () => {
    await fsExtra.remove(dir);
  });

  it('writes three files and only the noz variant ignores depth', async () => {
    const written = await generateDescriptors(dir, 'jester');

    expect(written).toEqual([
      path.join(dir, 'sprite_jester.vmt'),
      path.join(dir, 'sprite_jester_noz.vmt'),
      path.join(dir, 'icon_jester.vmt'),
    ]);

    const sprite = await fsExtra.readFile(path.join(dir, 'sprite_jester.vmt'), 'utf-8');
    const spriteNoz = await fsExtra.readFile(path.join(dir, 'sprite_jester_noz.vmt'), 'utf-8');
    const icon = await fsExtra.readFile(path.join(dir, 'icon_jester.vmt'), 'utf-8');

    expect(sprite).toBe(SPRITE_VMT);
    expect(spriteNoz).toBe(SPRITE_NOZ_VMT);
    expect(sprite.split('\n')[2]).toBe(spriteNoz.split('\n')[2]);
    expect(icon.split('\n')[2]).toBe('\t"$basetexture" "vgui/ttt/roles/jester/icon_jester"');
    expect(icon.includes('$ignorez')).toBe(false);
  });
});
