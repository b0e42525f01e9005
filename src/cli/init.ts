/** src/cli/init.ts
 * "strepro init" subcommand: write a starter manifest and .gitignore entries.
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { ensureDir } from 'fs-extra';

import { EnvironmentError } from '@/common/errors';
import { ensureProjectGitignore } from '@/runner/init/gitignore';
import { ok } from '@/runner/util/color';

import { MANIFEST_NAMES, manifestIn, manifestTemplate } from './config/load';
import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  say,
} from './output';

export type InitFlags = FormatFlags & { name?: string; force?: boolean };

export type InitResult = { manifestPath: string; gitignoreAdded: string[] };

/**
 * Create strepro.yml in `dir`. An existing manifest (any supported name) is
 * an error unless `force` is set, in which case it is rewritten in place.
 */
export const performInit = async (
  dir: string,
  opts: { name?: string; force?: boolean } = {},
): Promise<InitResult> => {
  const root = path.resolve(dir);
  await ensureDir(root);
  const existing = manifestIn(root);
  if (existing && !opts.force)
    throw new EnvironmentError(`${existing} already exists (use --force to overwrite)`);

  const manifestPath = existing ?? path.join(root, MANIFEST_NAMES[0]);
  await writeFile(
    manifestPath,
    manifestTemplate(opts.name ?? path.basename(root), manifestPath),
    'utf8',
  );
  const gitignoreAdded = await ensureProjectGitignore(root);
  return { manifestPath, gitignoreAdded };
};

export const initAction = async (
  dir: string | undefined,
  flags: InitFlags,
): Promise<void> => {
  const result = await performInit(dir ?? process.cwd(), {
    ...(flags.name ? { name: flags.name } : {}),
    ...(flags.force ? { force: true } : {}),
  });
  if (formatOf(flags) === 'json') {
    emitJson({ success: true, exitCode: 0, ...result });
    return;
  }
  say(`${ok('created')} ${result.manifestPath}`);
  if (result.gitignoreAdded.length)
    say(`.gitignore: added ${result.gitignoreAdded.join(', ')}`);
};

export function registerInit(cli: Command): Command {
  const sub = cli
    .command('init')
    .description('create strepro.yml in a directory (default: the current one)')
    .argument('[dir]', 'project directory')
    .option('--name <name>', 'project name (default: the directory name)')
    .option('-f, --force', 'overwrite an existing manifest');
  addFormatOptions(sub).action(
    guard(
      (_d: string | undefined, flags: InitFlags) => formatOf(flags),
      initAction,
    ),
  );
  return cli;
}
