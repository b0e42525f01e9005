/** Library entry point.
 * The CLI is one consumer; everything it does is reachable from here.
 */
export * from './common/errors';
export * from './runner/deps';
export * from './runner/errors';
export * from './runner/exec';
export * from './runner/packages';
export * from './runner/tasks';
export * from './runner/testing/discover';
export { toolVersion } from './runner/version';
export { makeCli } from './cli';
export {
  findProjectRoot,
  loadManifest,
  loadProject,
  type Project,
} from './cli/config/load';
export type { Manifest, UserConfig } from './cli/config/schema';
