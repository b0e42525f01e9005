/* src/runner/packages/types.ts
 * Package identities, resolved packages and the lock record.
 */

export const DEPENDENCY_GROUPS = ['production', 'dev', 'test'] as const;
export type DependencyGroup = (typeof DEPENDENCY_GROUPS)[number];

export type PackageSource =
  | { type: 'ssc' }
  | {
      type: 'github';
      /** `user/repo` */
      repo: string;
      /** Tag or branch; absent means the default tip (main, then master). */
      ref?: string;
      /** Commit sha pinned at lock time. */
      commit?: string;
    }
  | { type: 'net'; url: string }
  | { type: 'local'; path: string };

/** A manifest declaration. */
export type PackageRef = {
  name: string;
  source: PackageSource;
  /** Version constraint (`>=20230101`, `=1.2`, `>=1, <2`); absent means latest. */
  constraint?: string;
  group: DependencyGroup;
};

/** A concrete, checksummed version in the cache. Never edited once produced. */
export type ResolvedPackage = Readonly<{
  name: string;
  version: string;
  source: PackageSource;
  checksum: string;
  group: DependencyGroup;
  /** Cache slot directory. */
  path: string;
}>;

export type LockEntry = {
  version: string;
  source: PackageSource;
  checksum: string;
  group: DependencyGroup;
};

export const LOCKFILE_FORMAT = '1';

export type Lockfile = {
  version: typeof LOCKFILE_FORMAT;
  /** Version of the tool that wrote the file. */
  tool: string;
  manifestHash: string;
  /** Sorted by package name. */
  packages: Record<string, LockEntry>;
};

/** One payload file as downloaded. */
export type PackageFile = { name: string; data: Uint8Array };
