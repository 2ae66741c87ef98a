import chalk from 'chalk';
import { spawn } from 'child_process';
import fsExtra from 'fs-extra';
import path from 'path';

import { getVariantFileBase, VTF_VARIANTS } from '@/lib/converter/role-icon/constants';
import { getDefaultConfig } from '@/lib/global-config';

export interface ProcessResult {
  // null when the process could not be started or was killed by a signal
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessResult>;

export interface ConvertFormatOptions {
  vtfCmdPath?: string;
  runner?: ProcessRunner;
}

export type ConversionReport =
  | { status: 'skipped' }
  | { status: 'missing'; vtfCmdPath: string }
  | {
    status: 'done';
    converted: string[];
    failed: { file: string; exitCode: number | null }[];
  };

/**
 * Run a command to completion and capture its output. Never rejects.
 */
export const spawnProcess: ProcessRunner = (command, args) => new Promise((resolve) => {
  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  let settled = false;

  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

  child.on('error', (err) => {
    if (settled) return;
    settled = true;
    resolve({ exitCode: null, stdout: Buffer.concat(stdout).toString(), stderr: err.message });
  });
  child.on('close', (code) => {
    if (settled) return;
    settled = true;
    resolve({
      exitCode: code,
      stdout: Buffer.concat(stdout).toString(),
      stderr: Buffer.concat(stderr).toString(),
    });
  });
});

/**
 * Convert the sprite and icon PNGs to VTF with VTFCmd, one file at a time.
 * A missing executable or a failing file is reported and skipped; this never throws.
 */
export async function convertFormat(
  outputDir: string,
  namespace: string,
  skip: boolean,
  options: ConvertFormatOptions = {},
): Promise<ConversionReport> {
  if (skip) {
    console.log(chalk.gray('– Skipping VTF conversion.'));
    return { status: 'skipped' };
  }

  const vtfCmdPath = options.vtfCmdPath ?? getDefaultConfig().vtfCmdPath;
  const runner = options.runner ?? spawnProcess;

  if (!await fsExtra.pathExists(vtfCmdPath)) {
    console.warn(chalk.yellow(`VTFCmd not found at "${vtfCmdPath}"; skipping.`));
    return { status: 'missing', vtfCmdPath };
  }

  const converted: string[] = [];
  const failed: { file: string; exitCode: number | null }[] = [];

  for (const variant of VTF_VARIANTS) {
    const pngName = `${getVariantFileBase(variant, namespace)}.png`;
    const pngPath = path.join(outputDir, pngName);
    console.log(`→ Converting ${chalk.yellow(pngName)} …`);

    let result: ProcessResult;
    try {
      result = await runner(vtfCmdPath, ['-file', pngPath, '-output', outputDir]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = { exitCode: null, stdout: '', stderr: message };
    }

    if (result.exitCode === 0) {
      converted.push(pngPath);
    } else {
      const detail = result.stderr.trim();
      console.warn(chalk.yellow(`VTFCmd failed on ${pngName}: exit ${result.exitCode ?? 'none'}${detail ? ` (${detail})` : ''}`));
      failed.push({ file: pngPath, exitCode: result.exitCode });
    }
  }

  return { status: 'done', converted, failed };
}
