/* src/runner/exec/isolation.ts
 * Per-run ado search path (S_ADO) from the lockfile.
 */
import { PackageCache } from '@/runner/packages/cache';
import { lockedEntries } from '@/runner/packages/manager';
import type { DependencyGroup, Lockfile } from '@/runner/packages/types';

export const GLOBAL_ADO_DIRS = ['SITE', 'PERSONAL', 'PLUS', 'OLDPLACE'] as const;

export type IsolationOptions = {
  allowGlobal?: boolean;
  groups?: readonly DependencyGroup[];
};

/**
 * Locked package slots in lockfile order, then BASE (and the global
 * directories with allowGlobal). Frozen: callers never edit a built path.
 */
export const buildAdoPath = (
  lock: Lockfile,
  cache: PackageCache,
  opts: IsolationOptions = {},
): readonly string[] =>
  Object.freeze([
    ...lockedEntries(lock, opts.groups).map(([name, e]) =>
      cache.slotPath(name, e.version),
    ),
    'BASE',
    ...(opts.allowGlobal ? GLOBAL_ADO_DIRS : []),
  ]);

export const formatAdoPath = (dirs: readonly string[]): string => dirs.join(';');

/** Child env additions; empty (interpreter defaults) when there is no lock. */
export const isolationEnv = (
  adoPath: readonly string[] | undefined,
): Record<string, string> =>
  adoPath ? { S_ADO: formatAdoPath(adoPath) } : {};
