/* src/cli/env.ts
 * `strepro env` (what a run would use) and `strepro doctor` (is it usable).
 */
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { ensureDir, pathExists } from 'fs-extra';

import { EXIT } from '@/common/errors';
import { type DetectedBinary, detectBinary } from '@/runner/exec/binary';
import { buildAdoPath, formatAdoPath } from '@/runner/exec/isolation';
import { lockfilePath, readLockfile } from '@/runner/packages/lockfile';
import { checkLock } from '@/runner/packages/manager';
import type { Lockfile } from '@/runner/packages/types';
import { dim, error, ok, warn } from '@/runner/util/color';
import { reasonOf } from '@/runner/util/debug';
import { toolVersion } from '@/runner/version';

import { loadProject, type Project } from './config/load';
import type { UserConfig } from './config/schema';
import { loadUserConfig, userConfigPath } from './config/user';
import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  say,
} from './output';
import { cacheRootFor, type EngineFlags, openWorkspace } from './session';

export type EnvFlags = FormatFlags & EngineFlags;

const tryDetect = (
  flags: EngineFlags,
  user: UserConfig,
): { binary?: DetectedBinary; error?: string } => {
  try {
    return {
      binary: detectBinary({
        ...(flags.engine ? { explicit: flags.engine } : {}),
        ...(user.stataBinary ? { configured: user.stataBinary } : {}),
      }),
    };
  } catch (e) {
    return { error: reasonOf(e) };
  }
};

export const envAction = async (flags: EnvFlags): Promise<void> => {
  const ws = await openWorkspace();
  const { binary, error: binaryError } = tryDetect(flags, ws.user);
  const root = ws.project?.root;
  const lockFile = root ? lockfilePath(root) : undefined;
  const adoPath = ws.lock ? formatAdoPath(buildAdoPath(ws.lock, ws.cache)) : undefined;

  if (formatOf(flags) === 'json') {
    emitJson({
      version: toolVersion(),
      binary: binary ?? null,
      ...(binaryError ? { binaryError } : {}),
      cacheDir: ws.cache.root,
      userConfig: userConfigPath(),
      projectRoot: root ?? null,
      manifest: ws.project?.manifestPath ?? null,
      lockfile: ws.lock && lockFile ? lockFile : null,
      adoPath: adoPath ?? null,
    });
    return;
  }
  const none = dim('(none)');
  const rows: Array<[string, string]> = [
    ['version', toolVersion()],
    ['binary', binary ? `${binary.path} ${dim(`(${binary.source})`)}` : warn('not found')],
    ['cache', ws.cache.root],
    ['user config', userConfigPath()],
    ['project', root ?? none],
    ['manifest', ws.project?.manifestPath ?? none],
    ['lockfile', ws.lock && lockFile ? lockFile : none],
    ['S_ADO', adoPath ?? dim('(interpreter defaults)')],
  ];
  const width = Math.max(...rows.map(([k]) => k.length));
  rows.forEach(([k, v]) => console.log(`${k.padEnd(width)}  ${v}`));
};

type CheckStatus = 'ok' | 'warn' | 'fail';
type Check = { name: string; status: CheckStatus; detail: string };

const check = (name: string, status: CheckStatus, detail: string): Check => ({
  name,
  status,
  detail,
});

const cacheCheck = async (root: string): Promise<Check> => {
  try {
    await ensureDir(root);
    await access(root, constants.W_OK);
    return check('cache', 'ok', `${root} is writable`);
  } catch (e) {
    return check('cache', 'fail', `${root}: ${reasonOf(e)}`);
  }
};

const projectChecks = async (cwd: string): Promise<Check[]> => {
  let project: Project | undefined;
  try {
    project = await loadProject(cwd);
  } catch (e) {
    return [check('manifest', 'fail', reasonOf(e))];
  }
  if (!project) return [check('manifest', 'warn', `no strepro.yml above ${cwd}`)];
  const out = [
    check(
      'manifest',
      'ok',
      path.relative(cwd, project.manifestPath) || project.manifestPath,
    ),
  ];

  let lock: Lockfile | undefined;
  try {
    lock = await readLockfile(project.root);
  } catch (e) {
    return [...out, check('lockfile', 'fail', reasonOf(e))];
  }
  const sync = checkLock(project.manifest.packages, lock);
  if (sync.inSync) return [...out, check('lockfile', 'ok', 'in sync with the manifest')];
  if (!(await pathExists(lockfilePath(project.root))))
    return [...out, check('lockfile', 'warn', 'missing (run "strepro lock")')];
  return [...out, check('lockfile', 'warn', 'out of sync (run "strepro lock")')];
};

export const doctorAction = async (flags: EnvFlags): Promise<void> => {
  const cwd = process.cwd();
  const checks: Check[] = [];
  let user: UserConfig = {};
  try {
    user = await loadUserConfig();
    checks.push(check('user config', 'ok', userConfigPath()));
  } catch (e) {
    checks.push(check('user config', 'fail', reasonOf(e)));
  }

  const { binary, error: binaryError } = tryDetect(flags, user);
  checks.push(
    binary
      ? check('binary', 'ok', `${binary.path} (${binary.source})`)
      : check('binary', 'fail', binaryError ?? 'not found'),
  );
  checks.push(await cacheCheck(cacheRootFor(user)));
  checks.push(...(await projectChecks(cwd)));

  const healthy = checks.every((c) => c.status !== 'fail');
  const exitCode = healthy ? EXIT.success : EXIT.environment;
  process.exitCode = exitCode;

  if (formatOf(flags) === 'json') {
    emitJson({ success: healthy, exitCode, checks });
    return;
  }
  const mark = { ok: ok('ok'), warn: warn('warn'), fail: error('FAIL') } as const;
  checks.forEach((c) => console.log(`${mark[c.status]}  ${c.name}: ${c.detail}`));
  say(healthy ? ok('environment looks usable') : error('environment has problems'));
};

const withEngine = (cmd: Command): Command =>
  addFormatOptions(cmd.option('--engine <path>', 'interpreter binary (default: detected)'));

export const registerEnv = (cli: Command): Command => {
  withEngine(
    cli
      .command('env')
      .description('show the binary, cache, project, lockfile and isolation path'),
  ).action(guard((flags: EnvFlags) => formatOf(flags), envAction));
  withEngine(
    cli
      .command('doctor')
      .description('check that runs can work here (exit 10 on problems)'),
  ).action(guard((flags: EnvFlags) => formatOf(flags), doctorAction));
  return cli;
};
