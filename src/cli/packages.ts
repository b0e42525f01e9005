/* src/cli/packages.ts
 * Package commands: lock, update, install, add, remove, outdated.
 */
import path from 'node:path';

import type { Command } from 'commander';

import { EnvironmentError, LockfileError } from '@/common/errors';
import { writeLockfile } from '@/runner/packages/lockfile';
import {
  checkLock,
  findOutdated,
  generateLock,
  installLocked,
  type LockResult,
} from '@/runner/packages/manager';
import type { Resolution } from '@/runner/packages/resolver';
import {
  type ManifestPackages,
  parseSource,
  sourceSpec,
  toPackageSpec,
} from '@/runner/packages/spec';
import type { DependencyGroup, Lockfile } from '@/runner/packages/types';
import { dim, ok, warn } from '@/runner/util/color';
import { reasonOf } from '@/runner/util/debug';

import { parseGroups } from './cli-utils';
import { editManifestPackages, type PackageEdit, type Project } from './config/load';
import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  renderTable,
  say,
} from './output';
import { openProject, resolverFor, type Workspace } from './session';

/** `lock --check` when the lockfile does not answer the manifest. */
export const OUT_OF_SYNC_EXIT = 1;

type ProjectWorkspace = Workspace & { project: Project };

const resolutionJson = (r: Resolution): Record<string, unknown> => ({
  name: r.name,
  version: r.version,
  source: sourceSpec(r.source),
  group: r.group,
  checksum: r.checksum,
  fetched: r.fetched,
});

const resolutionLine = (r: Resolution): string =>
  `  ${r.name} ${r.version} (${sourceSpec(r.source)})${r.fetched ? '' : dim(' cached')}`;

/** Resolve, write strepro.lock and report. */
const relock = async (
  ws: ProjectWorkspace,
  packages: ManifestPackages | undefined,
  flags: FormatFlags,
  update?: true | readonly string[],
): Promise<void> => {
  const result: LockResult = await generateLock({
    resolver: resolverFor(ws),
    packages,
    ...(ws.lock ? { previous: ws.lock } : {}),
    ...(update ? { update } : {}),
  });
  const file = await writeLockfile(ws.project.root, result.lock);
  const rel = path.relative(ws.cwd, file) || file;

  if (formatOf(flags) === 'json') {
    emitJson({
      success: true,
      exitCode: 0,
      lockfile: file,
      packages: Object.keys(result.lock.packages).length,
      resolved: result.resolved.map(resolutionJson),
      kept: result.kept,
      dropped: result.dropped,
    });
    return;
  }
  say(
    `${ok('locked')} ${String(
      Object.keys(result.lock.packages).length,
    )} package(s) in ${rel} (${String(result.resolved.length)} resolved, ${String(
      result.kept.length,
    )} unchanged)`,
  );
  result.resolved.forEach((r) => console.log(resolutionLine(r)));
  if (result.dropped.length) say(`dropped: ${result.dropped.join(', ')}`);
};

const requireLock = (ws: ProjectWorkspace): Lockfile => {
  if (!ws.lock)
    throw new LockfileError('strepro: no strepro.lock; run "strepro lock" first');
  return ws.lock;
};

export type LockFlags = FormatFlags & { check?: boolean };

export const lockAction = async (flags: LockFlags): Promise<void> => {
  const ws = await openProject();
  const packages = ws.project.manifest.packages;
  if (!flags.check) {
    await relock(ws, packages, flags);
    return;
  }

  const c = checkLock(packages, ws.lock);
  const exitCode = c.inSync ? 0 : OUT_OF_SYNC_EXIT;
  process.exitCode = exitCode;
  if (formatOf(flags) === 'json') {
    emitJson({ success: c.inSync, exitCode, ...c });
    return;
  }
  if (c.inSync) {
    say(ok('strepro.lock is up to date'));
    return;
  }
  say(warn(c.lockfileMissing ? 'strepro.lock is missing' : 'strepro.lock is out of sync'));
  c.added.forEach((n) => console.log(`  + ${n} (not locked)`));
  c.removed.forEach((n) => console.log(`  - ${n} (no longer declared)`));
  c.changed.forEach((x) => console.log(`  ~ ${x.name}: ${x.reason}`));
  if (c.manifestChanged && !c.lockfileMissing)
    console.log('  manifest changed since the last lock');
};

export const updateAction = async (names: string[], flags: FormatFlags): Promise<void> => {
  const ws = await openProject();
  const lower = names.map((n) => n.toLowerCase());
  await relock(ws, ws.project.manifest.packages, flags, lower.length ? lower : true);
};

export type InstallFlags = FormatFlags & { group?: DependencyGroup[] };

export const installAction = async (flags: InstallFlags): Promise<void> => {
  const ws = await openProject();
  const lock = requireLock(ws);
  const installed = await installLocked(resolverFor(ws), lock, flags.group);
  if (formatOf(flags) === 'json') {
    emitJson({ success: true, exitCode: 0, installed: installed.map(resolutionJson) });
    return;
  }
  const fetched = installed.filter((r) => r.fetched).length;
  say(
    `${ok('installed')} ${String(installed.length)} package(s) (${String(
      fetched,
    )} fetched, ${String(installed.length - fetched)} already cached)`,
  );
  installed.filter((r) => r.fetched).forEach((r) => console.log(resolutionLine(r)));
};

export type AddFlags = FormatFlags & {
  source?: string;
  version?: string;
  dev?: boolean;
  test?: boolean;
};

export const addAction = async (names: string[], flags: AddFlags): Promise<void> => {
  if (flags.dev && flags.test) throw new EnvironmentError('give --dev or --test, not both');
  const source = flags.source ?? 'ssc';
  try {
    parseSource(source);
  } catch (e) {
    throw new EnvironmentError(reasonOf(e));
  }
  const group: DependencyGroup = flags.dev ? 'dev' : flags.test ? 'test' : 'production';
  const spec = toPackageSpec(source, flags.version);
  const ws = await openProject();
  const edits: PackageEdit[] = names.map((name) => ({ op: 'set', group, name, spec }));
  const { manifest } = await editManifestPackages(ws.project.manifestPath, edits);
  if (formatOf(flags) !== 'json')
    say(`added ${names.map((n) => n.toLowerCase()).join(', ')} to ${group}`);
  await relock(ws, manifest.packages, flags);
};

export const removeAction = async (names: string[], flags: FormatFlags): Promise<void> => {
  const ws = await openProject();
  const edits: PackageEdit[] = names.map((name) => ({ op: 'remove', name }));
  const { manifest, missing } = await editManifestPackages(ws.project.manifestPath, edits);
  if (formatOf(flags) !== 'json' && missing.length)
    say(warn(`not declared: ${missing.join(', ')}`));
  await relock(ws, manifest.packages, flags);
};

export const outdatedAction = async (flags: FormatFlags): Promise<void> => {
  const ws = await openProject();
  const rows = await findOutdated(resolverFor(ws), requireLock(ws));
  if (formatOf(flags) === 'json') {
    emitJson({ outdated: rows });
    return;
  }
  if (!rows.length) {
    say(ok('all locked packages are current'));
    return;
  }
  console.log(
    renderTable(
      ['Package', 'Group', 'Source', 'Locked', 'Latest'],
      rows.map((r) => [
        r.name,
        r.group,
        r.source,
        r.locked,
        r.latest ?? warn(r.error ?? 'unknown'),
      ]),
    ),
  );
};

export const registerPackages = (cli: Command): Command => {
  addFormatOptions(
    cli
      .command('lock')
      .description('resolve every declared package and write strepro.lock')
      .option(
        '--check',
        'verify strepro.lock against the manifest without changing anything',
      ),
  ).action(guard((flags: LockFlags) => formatOf(flags), lockAction));

  addFormatOptions(
    cli
      .command('update')
      .description('re-resolve packages to their current versions and relock')
      .argument('[names...]', 'packages to update (default: all)'),
  ).action(guard((_n: string[], flags: FormatFlags) => formatOf(flags), updateAction));

  addFormatOptions(
    cli
      .command('install')
      .description('fetch every locked package into the cache, exactly as locked')
      .option(
        '--group <groups>',
        'only these dependency groups (comma-separated)',
        parseGroups,
      ),
  ).action(guard((flags: InstallFlags) => formatOf(flags), installAction));

  addFormatOptions(
    cli
      .command('add')
      .description('declare packages in the manifest and relock')
      .argument('<names...>', 'package names')
      .option(
        '--source <source>',
        'ssc, github:user/repo[@ref], net:<url> or local:<path> (default ssc)',
      )
      .option('--version <constraint>', 'version constraint, e.g. ">=20230101"')
      .option('--dev', 'add to dev')
      .option('--test', 'add to test'),
  ).action(guard((_n: string[], flags: AddFlags) => formatOf(flags), addAction));

  addFormatOptions(
    cli
      .command('remove')
      .description('drop packages from the manifest and relock')
      .argument('<names...>', 'package names'),
  ).action(
    guard((_n: string[], flags: FormatFlags) => formatOf(flags), removeAction),
  );

  addFormatOptions(
    cli
      .command('outdated')
      .description('list locked packages whose source offers a newer version'),
  ).action(guard((flags: FormatFlags) => formatOf(flags), outdatedAction));

  return cli;
};
