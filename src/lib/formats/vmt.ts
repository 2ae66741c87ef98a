import fsExtra from 'fs-extra';
import path from 'path';

import { getDefaultConfig } from '@/lib/global-config';

export interface MaterialDescriptor {
  fileName: string;
  baseTexture: string;
  ignoreZ: boolean;
}

export function getRoleDescriptors(namespace: string): MaterialDescriptor[] {
  return [
    { fileName: `sprite_${namespace}.vmt`, baseTexture: `sprite_${namespace}`, ignoreZ: false },
    // same texture, drawn through walls
    { fileName: `sprite_${namespace}_noz.vmt`, baseTexture: `sprite_${namespace}`, ignoreZ: true },
    { fileName: `icon_${namespace}.vmt`, baseTexture: `icon_${namespace}`, ignoreZ: false },
  ];
}

export function renderVmt(
  descriptor: MaterialDescriptor,
  namespace: string,
  materialBasePath = getDefaultConfig().materialBasePath,
): string {
  const lines = [
    '"UnlitGeneric"',
    '{',
    `\t"$basetexture" "${materialBasePath}/${namespace}/${descriptor.baseTexture}"`,
    '\t$nocull 1',
  ];
  if (descriptor.ignoreZ) {
    lines.push('\t$ignorez 1');
  }
  lines.push(
    '\t$nodecal 1',
    '\t$nolod 1',
    '\t$vertexcolor 1',
    '\t$vertexalpha 1',
    '\t$translucent 1',
    '}',
  );
  return `${lines.join('\n')}\n`;
}

/**
 * Write the sprite, sprite_noz and icon material files
 * @returns Paths of the written files
 */
export async function generateDescriptors(outputDir: string, namespace: string): Promise<string[]> {
  await fsExtra.ensureDir(outputDir);

  const written: string[] = [];
  for (const descriptor of getRoleDescriptors(namespace)) {
    const filePath = path.join(outputDir, descriptor.fileName);
    await fsExtra.writeFile(filePath, renderVmt(descriptor, namespace), 'utf-8');
    written.push(filePath);
  }
  return written;
}
