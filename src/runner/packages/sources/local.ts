/* src/runner/packages/sources/local.ts
 * Packages from a directory on disk (vendored or in development).
 *
 * The version is derived from the content digest, so two directories (or
 * two edits of one) never share a cache slot.
 */
import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';
import { pathExists } from 'fs-extra';

import { SourceUnavailableError } from '@/common/errors';
import { packageDigest, sha256Hex } from '@/runner/util/hash';

import { parsePkgFile, type PkgInfo, storedName } from '../pkg-file';
import type { PackageFile } from '../types';
import type { Located, SourceContext } from './common';

export const LOCAL_VERSION_PREFIX = 'local-';

/** Files picked up from a directory that has no `<name>.pkg`. */
export const LOCAL_EXTENSIONS = [
  'ado',
  'sthlp',
  'hlp',
  'do',
  'mata',
  'mlib',
  'dlg',
  'pkg',
] as const;

/** `local-<first 12 hex of the package digest>`. */
export const localVersion = (files: readonly PackageFile[]): string =>
  `${LOCAL_VERSION_PREFIX}${packageDigest(files.map((f) => sha256Hex(f.data)))
    .slice('sha256:'.length, 'sha256:'.length + 12)}`;

const readAll = (abs: string, listed: readonly string[]): Promise<PackageFile[]> =>
  Promise.all(
    listed.map(async (f) => ({
      name: storedName(f),
      data: new Uint8Array(await readFile(path.resolve(abs, f))),
    })),
  );

/** Top-level Stata files of `abs`, sorted; at least one must be an .ado. */
const scanDirectory = async (name: string, abs: string): Promise<PkgInfo> => {
  const files = (
    await fg([`*.{${LOCAL_EXTENSIONS.join(',')}}`], {
      cwd: abs,
      onlyFiles: true,
      deep: 1,
      caseSensitiveMatch: false,
    })
  ).sort();
  if (!files.some((f) => f.toLowerCase().endsWith('.ado')))
    throw new SourceUnavailableError(`no ${name}.pkg and no .ado files in ${abs}`, abs);
  return { title: name, files, description: [] };
};

export const locateLocal = async (
  name: string,
  dir: string,
  ctx: SourceContext,
): Promise<Located> => {
  const abs = path.resolve(ctx.projectRoot, dir);
  if (!(await pathExists(abs)) || !(await stat(abs)).isDirectory())
    throw new SourceUnavailableError(`local source is not a directory: ${abs}`, abs);

  const pkg = path.join(abs, `${name}.pkg`);
  const info = (await pathExists(pkg))
    ? parsePkgFile(await readFile(pkg, 'utf8'), name)
    : await scanDirectory(name, abs);
  const files = await readAll(abs, info.files);
  return {
    name,
    version: localVersion(files),
    source: { type: 'local', path: dir },
    info,
    download: () => Promise.resolve(files),
  };
};
