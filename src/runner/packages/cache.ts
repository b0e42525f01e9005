/* src/runner/packages/cache.ts
 * Machine-global, content-addressed package cache.
 *
 * Layout: <root>/packages/<name>/<version>/{files..., .entry.json, .access}.
 * Slots are written into a private staging directory, verified, and renamed
 * into place; an existing slot is never rewritten.
 */
import { randomUUID } from 'node:crypto';
import { readdir, rename, stat, utimes } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  ensureDir,
  outputFile,
  pathExists,
  readJson,
  remove,
  writeJson,
} from 'fs-extra';

import { IntegrityError, InternalError } from '@/common/errors';
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_CACHE_STAGE } from '@/runner/util/debug-scopes';
import { packageDigest, sha256File, sha256Hex } from '@/runner/util/hash';

import { type CacheEntryMeta, cacheEntryMetaSchema } from './schema';
import type { PackageFile, PackageSource } from './types';

export const ENTRY_META = '.entry.json';
export const ENTRY_ACCESS = '.access';
const STAGING_MARK = '.downloading.';

/**
 * Cache root: $STREPRO_CACHE_DIR, else the platform cache directory.
 */
export const defaultCacheRoot = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string => {
  if (env.STREPRO_CACHE_DIR) return env.STREPRO_CACHE_DIR;
  if (platform === 'win32')
    return path.join(
      env.LOCALAPPDATA ?? path.join(home, 'AppData', 'Local'),
      'strepro',
      'cache',
    );
  return path.join(env.XDG_CACHE_HOME ?? path.join(home, '.cache'), 'strepro');
};

/** Directory-safe version segment. */
const slotSegment = (v: string): string => v.replace(/[^\w.+-]/g, '_');

export type CacheEntry = {
  name: string;
  version: string;
  path: string;
  bytes: number;
  lastAccess: Date;
  checksum: string;
  source: PackageSource;
};

export type StoreInput = {
  name: string;
  version: string;
  source: PackageSource;
  files: readonly PackageFile[];
  /** When given, the staged bytes must hash to this digest. */
  expectedChecksum?: string;
};

export type StoreResult = {
  meta: CacheEntryMeta;
  path: string;
  /** The slot already existed (this or another process wrote it earlier). */
  reused: boolean;
};

export type CleanOptions = {
  maxAgeDays: number;
  /** `name@version` keys referenced by an active lockfile. */
  protect?: ReadonlySet<string>;
  force?: boolean;
  dryRun?: boolean;
  now?: Date;
};

export type CleanReport = {
  removed: CacheEntry[];
  protected: CacheEntry[];
  remaining: number;
  freedBytes: number;
};

export const entryKey = (name: string, version: string): string =>
  `${name}@${version}`;

const isAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: exists but owned by someone else
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
};

export class PackageCache {
  constructor(public readonly root: string = defaultCacheRoot()) {}

  get packagesDir(): string {
    return path.join(this.root, 'packages');
  }

  slotPath(name: string, version: string): string {
    return path.join(this.packagesDir, name.toLowerCase(), slotSegment(version));
  }

  /** Metadata of a complete slot, or undefined. */
  async lookup(
    name: string,
    version: string,
  ): Promise<CacheEntryMeta | undefined> {
    const file = path.join(this.slotPath(name, version), ENTRY_META);
    if (!(await pathExists(file))) return undefined;
    const parsed = cacheEntryMetaSchema.safeParse(await readJson(file));
    if (!parsed.success)
      throw new InternalError(`corrupt cache entry metadata: ${file}`);
    return parsed.data;
  }

  /** Record an access (eviction is by last access). */
  async touch(name: string, version: string): Promise<void> {
    const file = path.join(this.slotPath(name, version), ENTRY_ACCESS);
    const now = new Date();
    if (await pathExists(file)) await utimes(file, now, now);
    else await outputFile(file, '');
  }

  /**
   * Write a slot atomically. A slot that already exists is reused when its
   * checksum agrees and is an IntegrityError otherwise.
   */
  async store(input: StoreInput): Promise<StoreResult> {
    const { name, version, source, files, expectedChecksum } = input;
    const digest = packageDigest(files.map((f) => sha256Hex(f.data)));
    if (expectedChecksum && digest !== expectedChecksum)
      throw new IntegrityError(entryKey(name, version), expectedChecksum, digest);

    const final = this.slotPath(name, version);
    const existing = await this.lookup(name, version);
    if (existing) return this.reuse(existing, digest, final);

    await this.sweepStaging(name, version);
    const tag = randomUUID().slice(0, 8);
    const staging = `${final}${STAGING_MARK}${String(process.pid)}.${tag}`;
    const meta: CacheEntryMeta = {
      name: name.toLowerCase(),
      version,
      source,
      checksum: digest,
      files: files.map((f) => f.name),
      createdAt: new Date().toISOString(),
    };

    try {
      await ensureDir(staging);
      for (const f of files) await outputFile(path.join(staging, f.name), f.data);
      // Confirm what landed on disk before promoting it.
      const onDisk = packageDigest(
        await Promise.all(files.map((f) => sha256File(path.join(staging, f.name)))),
      );
      if (onDisk !== digest)
        throw new IntegrityError(entryKey(name, version), digest, onDisk);
      await writeJson(path.join(staging, ENTRY_META), meta, { spaces: 2 });
      await outputFile(path.join(staging, ENTRY_ACCESS), '');
    } catch (e) {
      await remove(staging);
      if (e instanceof IntegrityError) throw e;
      throw new InternalError(
        `cache write failed for ${entryKey(name, version)}`,
        { cause: e },
      );
    }

    try {
      await rename(staging, final);
    } catch (e) {
      await remove(staging);
      const winner = await this.lookup(name, version);
      if (winner) {
        debugFallback(
          DBG_SCOPE_CACHE_STAGE,
          `${entryKey(name, version)}: concurrent writer won`,
        );
        return this.reuse(winner, digest, final);
      }
      throw new InternalError(`cache promote failed for ${entryKey(name, version)}`, {
        cause: e,
      });
    }
    return { meta, path: final, reused: false };
  }

  private async reuse(
    existing: CacheEntryMeta,
    digest: string,
    final: string,
  ): Promise<StoreResult> {
    if (existing.checksum !== digest)
      throw new IntegrityError(
        entryKey(existing.name, existing.version),
        existing.checksum,
        digest,
      );
    await this.touch(existing.name, existing.version);
    return { meta: existing, path: final, reused: true };
  }

  /** Remove staging dirs for this slot left by processes that no longer exist. */
  async sweepStaging(name: string, version: string): Promise<void> {
    const parent = path.dirname(this.slotPath(name, version));
    if (!(await pathExists(parent))) return;
    const prefix = `${slotSegment(version)}${STAGING_MARK}`;
    for (const d of await readdir(parent)) {
      if (!d.startsWith(prefix)) continue;
      const pid = Number.parseInt(d.slice(prefix.length).split('.')[0] ?? '', 10);
      if (Number.isSafeInteger(pid) && pid !== process.pid && !isAlive(pid)) {
        debugFallback(DBG_SCOPE_CACHE_STAGE, `sweep stale ${d}`);
        await remove(path.join(parent, d));
      }
    }
  }

  /** Every complete entry, sorted by name then version. */
  async list(): Promise<CacheEntry[]> {
    if (!(await pathExists(this.packagesDir))) return [];
    const out: CacheEntry[] = [];
    for (const name of (await readdir(this.packagesDir)).sort()) {
      const nameDir = path.join(this.packagesDir, name);
      if (!(await stat(nameDir)).isDirectory()) continue;
      for (const v of (await readdir(nameDir)).sort()) {
        if (v.includes(STAGING_MARK)) continue;
        const slot = path.join(nameDir, v);
        const metaFile = path.join(slot, ENTRY_META);
        if (!(await pathExists(metaFile))) continue;
        const parsed = cacheEntryMetaSchema.safeParse(await readJson(metaFile));
        if (!parsed.success) {
          debugFallback(DBG_SCOPE_CACHE_STAGE, `skip corrupt entry ${slot}`);
          continue;
        }
        const meta = parsed.data;
        out.push({
          name: meta.name,
          version: meta.version,
          path: slot,
          bytes: await this.slotBytes(slot),
          lastAccess: await this.lastAccess(slot, meta),
          checksum: meta.checksum,
          source: meta.source,
        });
      }
    }
    return out;
  }

  private async slotBytes(slot: string): Promise<number> {
    let total = 0;
    for (const f of await readdir(slot)) {
      if (f === ENTRY_META || f === ENTRY_ACCESS) continue;
      const s = await stat(path.join(slot, f));
      if (s.isFile()) total += s.size;
    }
    return total;
  }

  private async lastAccess(slot: string, meta: CacheEntryMeta): Promise<Date> {
    const marker = path.join(slot, ENTRY_ACCESS);
    if (await pathExists(marker)) return (await stat(marker)).mtime;
    return new Date(meta.createdAt);
  }

  /**
   * Evict entries not accessed within maxAgeDays. Entries in `protect` stay
   * unless `force` is set.
   */
  async clean(opts: CleanOptions): Promise<CleanReport> {
    const now = (opts.now ?? new Date()).getTime();
    const cutoff = now - opts.maxAgeDays * 24 * 60 * 60 * 1000;
    const entries = await this.list();
    const removed: CacheEntry[] = [];
    const kept: CacheEntry[] = [];

    for (const e of entries) {
      if (e.lastAccess.getTime() >= cutoff) continue;
      if (!opts.force && opts.protect?.has(entryKey(e.name, e.version))) {
        kept.push(e);
        continue;
      }
      if (!opts.dryRun) await remove(e.path);
      removed.push(e);
    }

    if (!opts.dryRun) await this.pruneEmptyNames();
    return {
      removed,
      protected: kept,
      remaining: entries.length - removed.length,
      freedBytes: removed.reduce((n, e) => n + e.bytes, 0),
    };
  }

  private async pruneEmptyNames(): Promise<void> {
    if (!(await pathExists(this.packagesDir))) return;
    for (const name of await readdir(this.packagesDir)) {
      const dir = path.join(this.packagesDir, name);
      try {
        if ((await readdir(dir)).length === 0) await remove(dir);
      } catch (e) {
        debugFallback(DBG_SCOPE_CACHE_STAGE, `prune ${dir}: ${reasonOf(e)}`);
      }
    }
  }
}
