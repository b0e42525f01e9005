/* src/runner/packages/index.ts
 * Package resolver, lockfile manager and content-addressed cache.
 */
export * from './cache';
export * from './constraint';
export * from './fetcher';
export * from './lockfile';
export * from './manager';
export * from './pkg-file';
export * from './resolver';
export * from './spec';
export {
  type Located,
  locatePackage,
  type SourceContext,
  todayStamp,
} from './sources';
export { SSC_BASE_URL, SSC_MIRROR_URL, sscDirUrl } from './sources/ssc';
export { GITHUB_API_URL, GITHUB_RAW_URL, rawUrl } from './sources/github';
export {
  LOCAL_EXTENSIONS,
  LOCAL_VERSION_PREFIX,
  localVersion,
} from './sources/local';
export type * from './types';
export { DEPENDENCY_GROUPS, LOCKFILE_FORMAT } from './types';
