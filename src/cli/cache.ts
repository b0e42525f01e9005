/* src/cli/cache.ts
 * `strepro cache list|clean`.
 */
import type { Command } from 'commander';

import { type CacheEntry, entryKey } from '@/runner/packages/cache';
import { lockedKeys } from '@/runner/packages/lockfile';
import { sourceSpec } from '@/runner/packages/spec';
import { dim, ok, warn } from '@/runner/util/color';

import { positiveNumber } from './cli-utils';
import {
  addFormatOptions,
  emitJson,
  fmtBytes,
  formatOf,
  type FormatFlags,
  guard,
  renderTable,
  say,
} from './output';
import { openWorkspace } from './session';

/** Default eviction age for `cache clean`. */
export const DEFAULT_MAX_AGE_DAYS = 30;

const entryJson = (e: CacheEntry): Record<string, unknown> => ({
  name: e.name,
  version: e.version,
  source: sourceSpec(e.source),
  bytes: e.bytes,
  lastAccess: e.lastAccess.toISOString(),
  checksum: e.checksum,
  path: e.path,
});

const day = (d: Date): string => d.toISOString().slice(0, 10);

export const cacheListAction = async (flags: FormatFlags): Promise<void> => {
  const ws = await openWorkspace();
  const entries = await ws.cache.list();
  const locked = lockedKeys(ws.lock);
  if (formatOf(flags) === 'json') {
    emitJson({
      root: ws.cache.root,
      entries: entries.map((e) => ({
        ...entryJson(e),
        locked: locked.has(entryKey(e.name, e.version)),
      })),
    });
    return;
  }
  if (!entries.length) {
    say(`cache is empty (${ws.cache.root})`);
    return;
  }
  console.log(
    renderTable(
      ['Package', 'Version', 'Source', 'Size', 'Last used'],
      entries.map((e) => [
        locked.has(entryKey(e.name, e.version)) ? `${e.name} ${dim('(locked)')}` : e.name,
        e.version,
        sourceSpec(e.source),
        fmtBytes(e.bytes),
        day(e.lastAccess),
      ]),
    ),
  );
  say(
    `${String(entries.length)} entr${entries.length === 1 ? 'y' : 'ies'}, ${fmtBytes(
      entries.reduce((n, e) => n + e.bytes, 0),
    )} in ${ws.cache.root}`,
  );
};

export type CacheCleanFlags = FormatFlags & {
  maxAge?: number;
  force?: boolean;
  dryRun?: boolean;
};

export const cacheCleanAction = async (flags: CacheCleanFlags): Promise<void> => {
  const ws = await openWorkspace();
  const report = await ws.cache.clean({
    maxAgeDays: flags.maxAge ?? DEFAULT_MAX_AGE_DAYS,
    protect: lockedKeys(ws.lock),
    ...(flags.force ? { force: true } : {}),
    ...(flags.dryRun ? { dryRun: true } : {}),
  });
  if (formatOf(flags) === 'json') {
    emitJson({
      dryRun: flags.dryRun ?? false,
      removed: report.removed.map(entryJson),
      protected: report.protected.map(entryJson),
      remaining: report.remaining,
      freedBytes: report.freedBytes,
    });
    return;
  }
  const verb = flags.dryRun ? 'would remove' : 'removed';
  report.removed.forEach((e) => console.log(`  ${verb} ${entryKey(e.name, e.version)}`));
  if (report.protected.length)
    say(
      warn(
        `kept ${String(report.protected.length)} locked entr${
          report.protected.length === 1 ? 'y' : 'ies'
        } (use --force to evict)`,
      ),
    );
  say(
    `${ok(verb)} ${String(report.removed.length)}, freed ${fmtBytes(
      report.freedBytes,
    )}, ${String(report.remaining)} remaining`,
  );
};

export const registerCache = (cli: Command): Command => {
  const cache = cli.command('cache').description('inspect and evict the package cache');

  addFormatOptions(
    cache.command('list').description('list cached packages'),
  ).action(guard((flags: FormatFlags) => formatOf(flags), cacheListAction));

  addFormatOptions(
    cache
      .command('clean')
      .description('evict entries not used recently (locked entries are kept)')
      .option(
        '--max-age <days>',
        `evict entries unused for this many days (default ${String(DEFAULT_MAX_AGE_DAYS)})`,
        positiveNumber('--max-age'),
      )
      .option('--force', 'evict locked entries too')
      .option('--dry-run', 'report without removing'),
  ).action(guard((flags: CacheCleanFlags) => formatOf(flags), cacheCleanAction));

  return cli;
};
