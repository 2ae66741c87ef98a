import path from 'path';
import { fileURLToPath } from 'url';

export interface Config {
  vtfCmdPath: string
  templateDir: string
  materialBasePath: string
  defaultOutDir: string
}

export const DEFAULT_VTFCMD_PATH = 'E:\\Garry\\Software\\vtflib132-bin\\bin\\x64\\VTFCmd.exe';

// <repo>/resources/templates, independent of the working directory
const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

export function getDefaultConfig(): Config {
  return {
    vtfCmdPath: process.env.VTFCMD_PATH || DEFAULT_VTFCMD_PATH,
    templateDir: path.join(projectRoot, 'resources', 'templates'),
    materialBasePath: 'vgui/ttt/roles',
    defaultOutDir: 'RoleAddon',
  };
}
