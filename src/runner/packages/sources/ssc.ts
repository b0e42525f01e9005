/* src/runner/packages/sources/ssc.ts
 * SSC archive (Boston College) with the GitHub mirror as fallback.
 * The archive serves only the current version of each package.
 */
import { SourceUnavailableError } from '@/common/errors';
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_SSC_MIRROR } from '@/runner/util/debug-scopes';

import { fetchText } from '../fetcher';
import { parsePkgFile } from '../pkg-file';
import { downloadAll, type Located, type SourceContext } from './common';

export const SSC_BASE_URL = 'http://fmwww.bc.edu/repec/bocode';
export const SSC_MIRROR_URL =
  'https://raw.githubusercontent.com/labordynamicsinstitute/ssc-mirror/releases/fmwww.bc.edu/repec/bocode';

/** Directory URL for a package: bucketed by its first letter. */
export const sscDirUrl = (base: string, name: string): string =>
  `${base}/${name.charAt(0).toLowerCase()}/`;

export const locateSsc = async (
  name: string,
  ctx: SourceContext,
): Promise<Located> => {
  let lastError: unknown;
  for (const base of [SSC_BASE_URL, SSC_MIRROR_URL]) {
    const dir = sscDirUrl(base, name);
    try {
      const info = parsePkgFile(
        await fetchText(ctx.fetcher, `${dir}${name}.pkg`),
        name,
      );
      return {
        name,
        version: info.distributionDate ?? ctx.today(),
        source: { type: 'ssc' },
        info,
        download: () => downloadAll(ctx.fetcher, dir, info.files),
      };
    } catch (e) {
      lastError = e;
      debugFallback(DBG_SCOPE_SSC_MIRROR, `${dir}${name}.pkg: ${reasonOf(e)}`);
    }
  }
  throw new SourceUnavailableError(
    `package ${name} not found on SSC or its mirror`,
    `${sscDirUrl(SSC_BASE_URL, name)}${name}.pkg`,
    { cause: lastError },
  );
};
