/* src/runner/packages/sources/github.ts
 * GitHub repositories holding a .pkg manifest.
 * Without a ref the default tip is used (main, then master) and the commit
 * sha is recorded so installs from the lockfile are pinned.
 */
import { z } from 'zod';

import { SourceUnavailableError } from '@/common/errors';
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_GITHUB_REF } from '@/runner/util/debug-scopes';

import { type Fetcher, fetchText } from '../fetcher';
import { parsePkgFile } from '../pkg-file';
import type { PackageSource } from '../types';
import { downloadAll, type Located, type SourceContext } from './common';

export const GITHUB_RAW_URL = 'https://raw.githubusercontent.com';
export const GITHUB_API_URL = 'https://api.github.com';
const DEFAULT_BRANCHES = ['main', 'master'];

type GithubSource = Extract<PackageSource, { type: 'github' }>;

export const rawUrl = (repo: string, ref: string, file: string): string =>
  `${GITHUB_RAW_URL}/${repo}/${ref}/${file}`;

/** Where a repository may keep its .pkg. */
export const pkgCandidates = (name: string): string[] => [
  `${name}.pkg`,
  `src/${name}.pkg`,
  `pkg/${name}.pkg`,
  `ado/${name}.pkg`,
  `${name}/${name}.pkg`,
];

const commitSchema = z.object({ sha: z.string().min(7) });

/** Commit sha for a ref, or undefined when the API is unreachable. */
export const resolveCommit = async (
  fetcher: Fetcher,
  repo: string,
  ref: string,
): Promise<string | undefined> => {
  try {
    const body: unknown = JSON.parse(
      await fetchText(fetcher, `${GITHUB_API_URL}/repos/${repo}/commits/${ref}`),
    );
    return commitSchema.parse(body).sha;
  } catch (e) {
    debugFallback(DBG_SCOPE_GITHUB_REF, `commit ${repo}@${ref}: ${reasonOf(e)}`);
    return undefined;
  }
};

const dirOf = (p: string): string => {
  const i = p.lastIndexOf('/');
  return i < 0 ? '' : p.slice(0, i + 1);
};

export const locateGithub = async (
  name: string,
  source: GithubSource,
  ctx: SourceContext,
): Promise<Located> => {
  const refs = source.commit
    ? [source.commit]
    : source.ref
      ? [source.ref]
      : DEFAULT_BRANCHES;

  for (const ref of refs) {
    for (const candidate of pkgCandidates(name)) {
      let text: string;
      try {
        text = await fetchText(ctx.fetcher, rawUrl(source.repo, ref, candidate));
      } catch (e) {
        debugFallback(
          DBG_SCOPE_GITHUB_REF,
          `${source.repo}@${ref}/${candidate}: ${reasonOf(e)}`,
        );
        continue;
      }
      const info = parsePkgFile(text, name);
      const branch = source.commit ? source.ref : (source.ref ?? ref);
      const commit =
        source.commit ?? (await resolveCommit(ctx.fetcher, source.repo, ref));
      const base = rawUrl(source.repo, commit ?? ref, dirOf(candidate));
      return {
        name,
        version: info.distributionDate ?? commit?.slice(0, 8) ?? ref,
        source: {
          type: 'github',
          repo: source.repo,
          ...(branch ? { ref: branch } : {}),
          ...(commit ? { commit } : {}),
        },
        info,
        download: () => downloadAll(ctx.fetcher, base, info.files),
      };
    }
  }
  throw new SourceUnavailableError(
    `no ${name}.pkg found in github:${source.repo} (tried ${refs.join(', ')})`,
    rawUrl(source.repo, refs[0] ?? 'main', `${name}.pkg`),
  );
};
