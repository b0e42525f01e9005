/* src/runner/packages/sources/net.ts
 * Packages served from an arbitrary `net from` URL.
 */
import { fetchText } from '../fetcher';
import { parsePkgFile } from '../pkg-file';
import {
  downloadAll,
  type Located,
  type SourceContext,
  withSlash,
} from './common';

export const locateNet = async (
  name: string,
  url: string,
  ctx: SourceContext,
): Promise<Located> => {
  const base = withSlash(url);
  const info = parsePkgFile(await fetchText(ctx.fetcher, `${base}${name}.pkg`), name);
  return {
    name,
    version: info.distributionDate ?? ctx.today(),
    source: { type: 'net', url },
    info,
    download: () => downloadAll(ctx.fetcher, base, info.files),
  };
};
