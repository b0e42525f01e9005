/* src/runner/packages/manager.ts
 * Project-level package operations: lock, check, install, outdated.
 * Manifest edits (add/remove) happen in the config layer; these operate on
 * the already-parsed dependency sections.
 */
import { reasonOf } from '@/runner/util/debug';

import {
  emptyLockfile,
  entryMismatch,
  type LockDiff,
  manifestHash,
  verifyLockfile,
} from './lockfile';
import type { PackageResolver, Resolution } from './resolver';
import { declaredRefs, type ManifestPackages, sourceSpec } from './spec';
import type { DependencyGroup, LockEntry, Lockfile } from './types';

export type LockResult = {
  lock: Lockfile;
  /** Re-resolved during this run. */
  resolved: Resolution[];
  /** Carried over unchanged from the previous lockfile. */
  kept: string[];
  /** Present before, gone now. */
  dropped: string[];
};

export type LockOptions = {
  resolver: PackageResolver;
  packages: ManifestPackages | undefined;
  previous?: Lockfile;
  /** Force re-resolution: `true` for every package, or the listed names. */
  update?: true | readonly string[];
};

const lockEntryOf = (r: Resolution): LockEntry => ({
  version: r.version,
  source: r.source,
  checksum: r.checksum,
  group: r.group,
});

/**
 * Build a fresh lockfile from the manifest. Entries that still answer their
 * declaration are kept; everything else (and anything named in `update`) is
 * re-resolved into the cache.
 */
export const generateLock = async ({
  resolver,
  packages,
  previous,
  update,
}: LockOptions): Promise<LockResult> => {
  const forced = (name: string): boolean =>
    update === true || (update?.includes(name) ?? false);
  const lock = emptyLockfile(manifestHash(packages));
  const resolved: Resolution[] = [];
  const kept: string[] = [];
  const refs = declaredRefs(packages);

  for (const ref of refs) {
    const old = previous?.packages[ref.name];
    if (old && !forced(ref.name) && !entryMismatch(ref, old)) {
      lock.packages[ref.name] = old;
      kept.push(ref.name);
      continue;
    }
    const r = await resolver.resolve(ref);
    lock.packages[ref.name] = lockEntryOf(r);
    resolved.push(r);
  }

  const declared = new Set(refs.map((r) => r.name));
  const dropped = Object.keys(previous?.packages ?? {})
    .filter((n) => !declared.has(n))
    .sort();
  return { lock, resolved, kept, dropped };
};

export type LockCheck = LockDiff & { lockfileMissing: boolean };

/** Offline comparison; a missing lockfile is out of sync by definition. */
export const checkLock = (
  packages: ManifestPackages | undefined,
  lock: Lockfile | undefined,
): LockCheck => {
  const diff = verifyLockfile(packages, lock ?? emptyLockfile(''));
  return lock
    ? { ...diff, lockfileMissing: false }
    : { ...diff, inSync: false, lockfileMissing: true };
};

/** Locked entries in lockfile (name) order, optionally limited to groups. */
export const lockedEntries = (
  lock: Lockfile,
  groups?: readonly DependencyGroup[],
): Array<[string, LockEntry]> =>
  Object.entries(lock.packages)
    .filter(([, e]) => !groups || groups.includes(e.group))
    .sort(([a], [b]) => a.localeCompare(b));

/** Make every locked package present in the cache, exactly as locked. */
export const installLocked = async (
  resolver: PackageResolver,
  lock: Lockfile,
  groups?: readonly DependencyGroup[],
): Promise<Resolution[]> => {
  const out: Resolution[] = [];
  for (const [name, entry] of lockedEntries(lock, groups))
    out.push(await resolver.install(name, entry));
  return out;
};

export type OutdatedRow = {
  name: string;
  group: DependencyGroup;
  source: string;
  locked: string;
  /** Current version at the source, when it could be determined. */
  latest?: string;
  error?: string;
};

/**
 * Versions the sources offer now compared with the lock. Nothing is written;
 * only rows that differ (or could not be checked) are returned.
 */
export const findOutdated = async (
  resolver: PackageResolver,
  lock: Lockfile,
): Promise<OutdatedRow[]> => {
  const rows: OutdatedRow[] = [];
  for (const [name, entry] of lockedEntries(lock)) {
    const base = {
      name,
      group: entry.group,
      source: sourceSpec(entry.source),
      locked: entry.version,
    };
    // Pinned commits never move; check the branch tip instead.
    const source =
      entry.source.type === 'github'
        ? {
            type: 'github' as const,
            repo: entry.source.repo,
            ...(entry.source.ref ? { ref: entry.source.ref } : {}),
          }
        : entry.source;
    try {
      const located = await resolver.locate({ name, source });
      if (located.version !== entry.version)
        rows.push({ ...base, latest: located.version });
    } catch (e) {
      rows.push({ ...base, error: reasonOf(e) });
    }
  }
  return rows;
};
