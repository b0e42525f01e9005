/* src/runner/packages/resolver.ts
 * PackageRef -> ResolvedPackage: locate at the source, check the constraint,
 * then reuse or fill the cache slot.
 */
import { IntegrityError, LockfileError } from '@/common/errors';

import { entryKey, type PackageCache } from './cache';
import { satisfies } from './constraint';
import { type Fetcher, httpFetcher } from './fetcher';
import type { CacheEntryMeta } from './schema';
import { type Located, locatePackage, todayStamp } from './sources';
import type {
  DependencyGroup,
  LockEntry,
  PackageRef,
  ResolvedPackage,
} from './types';

export type ResolverOptions = {
  cache: PackageCache;
  projectRoot: string;
  fetcher?: Fetcher;
  today?: () => string;
};

export type Resolution = ResolvedPackage & {
  /** Payload was downloaded (false on a cache hit). */
  fetched: boolean;
};

const toResolved = (
  meta: CacheEntryMeta,
  group: DependencyGroup,
  slot: string,
  fetched: boolean,
): Resolution =>
  Object.freeze({
    name: meta.name,
    version: meta.version,
    source: meta.source,
    checksum: meta.checksum,
    group,
    path: slot,
    fetched,
  });

export class PackageResolver {
  private readonly fetcher: Fetcher;
  private readonly today: () => string;

  constructor(private readonly opts: ResolverOptions) {
    this.fetcher = opts.fetcher ?? httpFetcher;
    this.today = opts.today ?? (() => todayStamp());
  }

  get cache(): PackageCache {
    return this.opts.cache;
  }

  /** Find the current version at the source without downloading. */
  locate(ref: Pick<PackageRef, 'name' | 'source'>): Promise<Located> {
    return locatePackage(ref.name, ref.source, {
      fetcher: this.fetcher,
      projectRoot: this.opts.projectRoot,
      today: this.today,
    });
  }

  /** Resolve a declaration to a cached, checksummed package. */
  async resolve(ref: PackageRef): Promise<Resolution> {
    const located = await this.locate(ref);
    if (!satisfies(located.version, ref.constraint))
      throw new LockfileError(
        `${ref.name}: source offers ${located.version}, which does not satisfy ${ref.constraint ?? ''}`,
      );

    const slot = this.cache.slotPath(located.name, located.version);
    const hit = await this.cache.lookup(located.name, located.version);
    if (hit) {
      await this.cache.touch(hit.name, hit.version);
      return toResolved(hit, ref.group, slot, false);
    }
    const stored = await this.cache.store({
      name: located.name,
      version: located.version,
      source: located.source,
      files: await located.download(),
    });
    return toResolved(stored.meta, ref.group, stored.path, !stored.reused);
  }

  /**
   * Materialize a locked entry exactly. Never re-resolves: the pinned source
   * is fetched only when the slot is absent, and the bytes must match the
   * locked digest.
   */
  async install(name: string, entry: LockEntry): Promise<Resolution> {
    const slot = this.cache.slotPath(name, entry.version);
    const hit = await this.cache.lookup(name, entry.version);
    if (hit) {
      if (hit.checksum !== entry.checksum)
        throw new IntegrityError(
          entryKey(name, entry.version),
          entry.checksum,
          hit.checksum,
        );
      await this.cache.touch(name, entry.version);
      return toResolved(hit, entry.group, slot, false);
    }
    const located = await this.locate({ name, source: entry.source });
    const stored = await this.cache.store({
      name,
      version: entry.version,
      source: entry.source,
      files: await located.download(),
      expectedChecksum: entry.checksum,
    });
    return toResolved(stored.meta, entry.group, stored.path, !stored.reused);
  }
}
