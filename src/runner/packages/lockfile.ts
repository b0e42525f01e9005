/* src/runner/packages/lockfile.ts
 * strepro.lock: read, write and verify against the manifest.
 */
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { outputFile, pathExists } from 'fs-extra';

import { LockfileError } from '@/common/errors';
import { canonicalJson, sha256Hex } from '@/runner/util/hash';
import { toolVersion } from '@/runner/version';

import { satisfies } from './constraint';
import { lockfileSchema } from './schema';
import { declaredRefs, type ManifestPackages, sourceMatches } from './spec';
import type { LockEntry, Lockfile, PackageRef } from './types';
import { LOCKFILE_FORMAT } from './types';

export const LOCKFILE_NAME = 'strepro.lock';

export const lockfilePath = (projectRoot: string): string =>
  path.join(projectRoot, LOCKFILE_NAME);

/** sha256 over the canonical JSON of the dependency sections. */
export const manifestHash = (packages: ManifestPackages | undefined): string =>
  `sha256:${sha256Hex(
    canonicalJson({
      dependencies: packages?.dependencies ?? {},
      dev: packages?.dev ?? {},
      test: packages?.test ?? {},
    }),
  )}`;

export const emptyLockfile = (hash: string): Lockfile => ({
  version: LOCKFILE_FORMAT,
  tool: toolVersion(),
  manifestHash: hash,
  packages: {},
});

/** Parse lockfile text; LockfileError on malformed content. */
export const parseLockfile = (text: string, file = LOCKFILE_NAME): Lockfile => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new LockfileError(`${file}: invalid JSON`, { cause: e });
  }
  const parsed = lockfileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new LockfileError(`${file}: ${detail}`);
  }
  return parsed.data;
};

/** The project's lockfile, or undefined when none has been written. */
export const readLockfile = async (
  projectRoot: string,
): Promise<Lockfile | undefined> => {
  const file = lockfilePath(projectRoot);
  if (!(await pathExists(file))) return undefined;
  return parseLockfile(await readFile(file, 'utf8'), file);
};

/** Deterministic text: sorted keys, two-space indent, trailing newline. */
export const serializeLockfile = (lock: Lockfile): string =>
  `${canonicalJson(lock, 2)}\n`;

export const writeLockfile = async (
  projectRoot: string,
  lock: Lockfile,
): Promise<string> => {
  const file = lockfilePath(projectRoot);
  await outputFile(file, serializeLockfile(lock), 'utf8');
  return file;
};

export type LockChange = { name: string; reason: string };

export type LockDiff = {
  inSync: boolean;
  /** Declared but not locked. */
  added: string[];
  /** Locked but no longer declared. */
  removed: string[];
  changed: LockChange[];
  manifestChanged: boolean;
};

/** Why a locked entry no longer answers its declaration, if it does not. */
export const entryMismatch = (
  ref: PackageRef,
  entry: LockEntry,
): string | undefined => {
  if (!sourceMatches(ref.source, entry.source)) return 'source changed';
  if (ref.group !== entry.group)
    return `group changed (${entry.group} -> ${ref.group})`;
  if (!satisfies(entry.version, ref.constraint))
    return `locked ${entry.version} does not satisfy ${ref.constraint ?? ''}`;
  return undefined;
};

/** Compare the lockfile with the manifest. Offline; never mutates. */
export const verifyLockfile = (
  packages: ManifestPackages | undefined,
  lock: Lockfile,
): LockDiff => {
  const refs = declaredRefs(packages);
  const declared = new Set(refs.map((r) => r.name));
  const added: string[] = [];
  const changed: LockChange[] = [];

  for (const ref of refs) {
    const entry = lock.packages[ref.name];
    if (!entry) {
      added.push(ref.name);
      continue;
    }
    const reason = entryMismatch(ref, entry);
    if (reason) changed.push({ name: ref.name, reason });
  }
  const removed = Object.keys(lock.packages)
    .filter((n) => !declared.has(n))
    .sort();
  const manifestChanged = lock.manifestHash !== manifestHash(packages);

  return {
    inSync:
      added.length === 0 &&
      removed.length === 0 &&
      changed.length === 0 &&
      !manifestChanged,
    added,
    removed,
    changed,
    manifestChanged,
  };
};

/** `name@version` keys of a lockfile (cache eviction protection). */
export const lockedKeys = (lock: Lockfile | undefined): Set<string> =>
  new Set(
    Object.entries(lock?.packages ?? {}).map(([n, e]) => `${n}@${e.version}`),
  );
