/* src/cli/session.ts
 * Per-invocation context: project, user config, cache, lockfile, engine and
 * cancellation wiring shared by the commands.
 */
import path from 'node:path';

import { pathExists } from 'fs-extra';

import {
  type DetectedBinary,
  detectBinary,
  type Engine,
  engineOf,
} from '@/runner/exec/binary';
import { buildAdoPath } from '@/runner/exec/isolation';
import type { RunContext } from '@/runner/exec/run-one';
import { attachSessionSignals } from '@/runner/exec/signals';
import { ProcessSupervisor } from '@/runner/exec/supervisor';
import { defaultCacheRoot, PackageCache } from '@/runner/packages/cache';
import type { Fetcher } from '@/runner/packages/fetcher';
import { lockfilePath, readLockfile } from '@/runner/packages/lockfile';
import { lockedEntries } from '@/runner/packages/manager';
import { PackageResolver } from '@/runner/packages/resolver';
import type { DependencyGroup, Lockfile } from '@/runner/packages/types';
import { warn } from '@/runner/util/color';

import { loadProject, noProjectError, type Project } from './config/load';
import type { UserConfig } from './config/schema';
import { loadUserConfig } from './config/user';

export type Workspace = {
  cwd: string;
  project?: Project;
  user: UserConfig;
  cache: PackageCache;
  lock?: Lockfile;
};

/** $STREPRO_CACHE_DIR, then cacheDir from the user config, then the platform default. */
export const cacheRootFor = (
  user: UserConfig,
  env: NodeJS.ProcessEnv = process.env,
): string =>
  env.STREPRO_CACHE_DIR ? defaultCacheRoot(env) : (user.cacheDir ?? defaultCacheRoot(env));

/** Load what a command may need; nothing here touches the network. */
export const openWorkspace = async (
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<Workspace> => {
  const [project, user] = await Promise.all([loadProject(cwd), loadUserConfig()]);
  const cache = new PackageCache(cacheRootFor(user, env));
  const lock = project ? await readLockfile(project.root) : undefined;
  return { cwd, user, cache, ...(project ? { project } : {}), ...(lock ? { lock } : {}) };
};

/** Workspace that must be inside a project. */
export const openProject = async (
  cwd: string = process.cwd(),
): Promise<Workspace & { project: Project }> => {
  const ws = await openWorkspace(cwd);
  const { project } = ws;
  if (!project) throw noProjectError(cwd);
  return { ...ws, project };
};

export const lockPathOf = (ws: Workspace): string | undefined =>
  ws.project ? lockfilePath(ws.project.root) : undefined;

export const resolverFor = (
  ws: Workspace & { project: Project },
  fetcher?: Fetcher,
): PackageResolver =>
  new PackageResolver({
    cache: ws.cache,
    projectRoot: ws.project.root,
    ...(fetcher ? { fetcher } : {}),
  });

export type EngineFlags = { engine?: string };

/** Interpreter for this invocation (flag, env, user config, install dirs, PATH). */
export const detectFor = (ws: Workspace, flags: EngineFlags): DetectedBinary =>
  detectBinary({
    ...(flags.engine ? { explicit: flags.engine } : {}),
    ...(ws.user.stataBinary ? { configured: ws.user.stataBinary } : {}),
  });

export const engineFor = (ws: Workspace, flags: EngineFlags): Engine =>
  engineOf(detectFor(ws, flags).path);

export type IsolationFlags = { group?: DependencyGroup[]; allowGlobal?: boolean };

/**
 * S_ADO for runs in this workspace; undefined (interpreter defaults) without
 * a lockfile. Locked packages missing from the cache are reported.
 */
export const isolationFor = async (
  ws: Workspace,
  flags: IsolationFlags,
): Promise<readonly string[] | undefined> => {
  if (!ws.lock) return undefined;
  const missing: string[] = [];
  for (const [name, entry] of lockedEntries(ws.lock, flags.group))
    if (!(await pathExists(ws.cache.slotPath(name, entry.version)))) missing.push(name);
  if (missing.length)
    console.error(
      warn(`strepro: not in cache: ${missing.join(', ')} (run "strepro install")`),
    );
  return buildAdoPath(ws.lock, ws.cache, {
    allowGlobal: flags.allowGlobal ?? ws.project?.manifest.run?.allowGlobal ?? false,
    ...(flags.group ? { groups: flags.group } : {}),
  });
};

/** Working directory and log directory for runs in this workspace. */
export const runDirs = (ws: Workspace): { cwd: string; logDir?: string } => {
  const logDir = ws.project?.manifest.run?.logDir;
  return logDir && ws.project
    ? { cwd: ws.cwd, logDir: path.resolve(ws.project.root, logDir) }
    : { cwd: ws.cwd };
};

/** Timeout in ms: flag seconds, else manifest seconds. */
export const timeoutFor = (ws: Workspace, seconds?: number): number | undefined => {
  const s = seconds ?? ws.project?.manifest.run?.timeout;
  return s === undefined ? undefined : Math.round(s * 1000);
};

export const jobsFor = (ws: Workspace, jobs?: number): number | undefined =>
  jobs ?? ws.project?.manifest.run?.jobs;

/**
 * Run `fn` with an abort signal wired to SIGINT/SIGTERM and a supervisor
 * that kills every child on cancellation or exit.
 */
export const withCancellation = async <T>(
  base: Omit<RunContext, 'signal' | 'supervisor'>,
  fn: (ctx: RunContext) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  const supervisor = new ProcessSupervisor();
  const detach = attachSessionSignals({ controller, supervisor });
  try {
    return await fn({ ...base, signal: controller.signal, supervisor });
  } finally {
    detach();
  }
};
