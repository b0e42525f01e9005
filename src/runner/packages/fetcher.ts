/* src/runner/packages/fetcher.ts
 * Network seam. Everything that touches the network goes through a Fetcher.
 */
import { SourceUnavailableError } from '@/common/errors';

export type Fetcher = (url: string) => Promise<Uint8Array>;

/** Default fetcher over Node's global fetch. Non-2xx responses throw. */
export const httpFetcher: Fetcher = async (url) => {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { 'user-agent': 'strepro' },
      signal: AbortSignal.timeout(30_000),
    });
  } catch (e) {
    throw new SourceUnavailableError(`request failed: ${url}`, url, {
      cause: e,
    });
  }
  if (!res.ok)
    throw new SourceUnavailableError(
      `HTTP ${String(res.status)} for ${url}`,
      url,
    );
  return new Uint8Array(await res.arrayBuffer());
};

export const fetchText = async (fetcher: Fetcher, url: string): Promise<string> =>
  new TextDecoder('utf-8').decode(await fetcher(url));
