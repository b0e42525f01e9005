/* src/runner/packages/sources/index.ts
 * Dispatch a package source to its locator.
 */
import type { PackageSource } from '../types';
import type { Located, SourceContext } from './common';
import { locateGithub } from './github';
import { locateLocal } from './local';
import { locateNet } from './net';
import { locateSsc } from './ssc';

export const locatePackage = (
  name: string,
  source: PackageSource,
  ctx: SourceContext,
): Promise<Located> => {
  switch (source.type) {
    case 'ssc':
      return locateSsc(name, ctx);
    case 'github':
      return locateGithub(name, source, ctx);
    case 'net':
      return locateNet(name, source.url, ctx);
    case 'local':
      return locateLocal(name, source.path, ctx);
  }
};

export { type Located, type SourceContext, todayStamp } from './common';
