import minimist from 'minimist';
import { z } from 'zod';

import { ValidationError } from '@/lib/errors';
import { getDefaultConfig } from '@/lib/global-config';
import { isLowercase } from '@/lib/utils';

const stringFlag = (flag: string) => z.string({
  required_error: `--${flag} is required`,
  invalid_type_error: `--${flag} must be given once, with a value`,
});

const requiredString = (flag: string) => stringFlag(flag).min(1, `--${flag} is required`);

export const CliArgsSchema = z.object({
  image: requiredString('image'),
  // display name only, may be empty
  nameraw: stringFlag('nameraw'),
  nameshort: requiredString('nameshort').refine(isLowercase, 'nameshort must be lowercase'),
  out: requiredString('out').default(getDefaultConfig().defaultOutDir),
  templates: requiredString('templates').optional(),
  // minimist turns --no-vtf into vtf: false
  vtf: z.boolean().default(true),
}).transform((args) => ({
  image: args.image,
  nameRaw: args.nameraw,
  nameShort: args.nameshort,
  outDir: args.out,
  templateDir: args.templates,
  skipVtf: !args.vtf,
}));

export type CliArgs = z.infer<typeof CliArgsSchema>;

export const USAGE = 'Usage: role-icons --image <path> --nameraw <name> --nameshort <lowercase> [--out RoleAddon] [--templates <dir>] [--no-vtf]';

/**
 * @throws ValidationError listing every problem with the arguments
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const raw = minimist(argv, {
    string: ['image', 'nameraw', 'nameshort', 'out', 'templates'],
    boolean: ['vtf'],
    default: { vtf: true },
  });

  const parsed = CliArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message));
  }
  return parsed.data;
}
