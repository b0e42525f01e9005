/* src/runner/packages/sources/common.ts
 * Shared source plumbing: the located-package shape and bulk downloads.
 */
import type { Fetcher } from '../fetcher';
import { type PkgInfo, storedName } from '../pkg-file';
import type { PackageFile, PackageSource } from '../types';

export type SourceContext = {
  fetcher: Fetcher;
  /** Base for `local:` paths. */
  projectRoot: string;
  /** Fallback version when a package carries no distribution date (YYYYMMDD). */
  today: () => string;
};

/** A package found at its source: version known, payload not yet downloaded. */
export type Located = {
  name: string;
  version: string;
  /** Pinned form recorded in the lockfile. */
  source: PackageSource;
  info: PkgInfo;
  download: () => Promise<PackageFile[]>;
};

export const todayStamp = (d = new Date()): string =>
  d.toISOString().slice(0, 10).replace(/-/g, '');

export const withSlash = (url: string): string =>
  url.endsWith('/') ? url : `${url}/`;

/** Fetch every listed file relative to baseUrl; stored under its basename. */
export const downloadAll = (
  fetcher: Fetcher,
  baseUrl: string,
  files: readonly string[],
): Promise<PackageFile[]> =>
  Promise.all(
    files.map(async (f) => ({
      name: storedName(f),
      data: await fetcher(new URL(f, baseUrl).href),
    })),
  );
