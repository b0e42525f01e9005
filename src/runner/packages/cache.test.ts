import { mkdir, mkdtemp, readdir, readFile, rm, utimes } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { IntegrityError } from '@/common/errors';
import { packageDigest, sha256Hex } from '@/runner/util/hash';

import { defaultCacheRoot, ENTRY_ACCESS, PackageCache } from './cache';
import type { PackageFile } from './types';

const enc = (s: string): Uint8Array => new TextEncoder().encode(s);
const files = (body: string): PackageFile[] => [
  { name: 'tool.ado', data: enc(body) },
  { name: 'tool.sthlp', data: enc('help') },
];
const digestOf = (fs: PackageFile[]): string =>
  packageDigest(fs.map((f) => sha256Hex(f.data)));

const DAY = 24 * 60 * 60 * 1000;

describe('defaultCacheRoot', () => {
  it('prefers STREPRO_CACHE_DIR', () => {
    expect(defaultCacheRoot({ STREPRO_CACHE_DIR: '/x/cache' }, 'linux', '/home/u')).toBe(
      '/x/cache',
    );
  });

  it('uses XDG_CACHE_HOME, then ~/.cache', () => {
    expect(defaultCacheRoot({ XDG_CACHE_HOME: '/xdg' }, 'linux', '/home/u')).toBe(
      path.join('/xdg', 'strepro'),
    );
    expect(defaultCacheRoot({}, 'linux', '/home/u')).toBe(
      path.join('/home/u', '.cache', 'strepro'),
    );
  });

  it('uses LOCALAPPDATA on Windows', () => {
    expect(defaultCacheRoot({ LOCALAPPDATA: 'C:/L' }, 'win32', 'C:/U')).toBe(
      path.join('C:/L', 'strepro', 'cache'),
    );
  });
});

describe('PackageCache', () => {
  let root: string;
  let cache: PackageCache;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'strepro-cache-'));
    cache = new PackageCache(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stores a slot and reports it on lookup', async () => {
    const payload = files('program define tool\nend\n');
    const res = await cache.store({
      name: 'Tool',
      version: '20240115',
      source: { type: 'ssc' },
      files: payload,
    });
    expect(res.reused).toBe(false);
    expect(res.path).toBe(path.join(root, 'packages', 'tool', '20240115'));
    expect(res.meta.checksum).toBe(digestOf(payload));
    expect(await readFile(path.join(res.path, 'tool.ado'), 'utf8')).toBe(
      'program define tool\nend\n',
    );
    const meta = await cache.lookup('tool', '20240115');
    expect(meta?.files).toEqual(['tool.ado', 'tool.sthlp']);
    // No staging directories left behind.
    expect(await readdir(path.join(root, 'packages', 'tool'))).toEqual(['20240115']);
  });

  it('lets two concurrent writers of one slot both succeed', async () => {
    const payload = files('program define tool\nend\n');
    const input = {
      name: 'tool',
      version: '20240115',
      source: { type: 'ssc' } as const,
      files: payload,
    };
    const results = await Promise.all([cache.store(input), cache.store(input)]);
    expect(results.map((r) => r.reused).sort()).toEqual([false, true]);
    expect(results.map((r) => r.meta.checksum)).toEqual([
      digestOf(payload),
      digestOf(payload),
    ]);
    expect(await readdir(path.join(root, 'packages', 'tool'))).toEqual(['20240115']);
    expect((await readdir(path.join(root, 'packages', 'tool', '20240115'))).sort()).toEqual([
      '.access',
      '.entry.json',
      'tool.ado',
      'tool.sthlp',
    ]);
    expect(
      await readFile(path.join(root, 'packages', 'tool', '20240115', 'tool.ado'), 'utf8'),
    ).toBe('program define tool\nend\n');
  });

  it('refuses bytes that do not match the expected digest', async () => {
    await expect(
      cache.store({
        name: 'tool',
        version: '1',
        source: { type: 'ssc' },
        files: files('a'),
        expectedChecksum: digestOf(files('b')),
      }),
    ).rejects.toBeInstanceOf(IntegrityError);
    expect(await cache.lookup('tool', '1')).toBeUndefined();
  });

  it('reuses an identical slot and never overwrites a different one', async () => {
    const input = { name: 'tool', version: '1', source: { type: 'ssc' as const } };
    await cache.store({ ...input, files: files('a') });
    const again = await cache.store({ ...input, files: files('a') });
    expect(again.reused).toBe(true);
    await expect(cache.store({ ...input, files: files('changed') })).rejects.toThrow(
      /checksum mismatch for tool@1/,
    );
    expect(await readFile(path.join(again.path, 'tool.ado'), 'utf8')).toBe('a');
  });

  it('sweeps staging directories of dead processes', async () => {
    const stale = path.join(root, 'packages', 'tool', '1.downloading.999999999.abcd1234');
    await mkdir(stale, { recursive: true });
    await cache.sweepStaging('tool', '1');
    expect(await readdir(path.join(root, 'packages', 'tool'))).toEqual([]);
  });

  it('lists entries with their sizes', async () => {
    await cache.store({ name: 'b', version: '2', source: { type: 'ssc' }, files: files('xx') });
    await cache.store({ name: 'a', version: '1', source: { type: 'ssc' }, files: files('x') });
    const list = await cache.list();
    expect(list.map((e) => `${e.name}@${e.version}:${String(e.bytes)}`)).toEqual([
      'a@1:5',
      'b@2:6',
    ]);
  });

  describe('clean', () => {
    const now = new Date('2026-06-01T00:00:00Z');
    const age = async (name: string, version: string, days: number): Promise<void> => {
      const t = new Date(now.getTime() - days * DAY);
      await utimes(path.join(cache.slotPath(name, version), ENTRY_ACCESS), t, t);
    };

    beforeEach(async () => {
      for (const [name, version] of [
        ['old', '1'],
        ['locked', '1'],
        ['fresh', '1'],
      ] as const) {
        await cache.store({ name, version, source: { type: 'ssc' }, files: files(name) });
      }
      await age('old', '1', 40);
      await age('locked', '1', 40);
      await age('fresh', '1', 2);
    });

    it('evicts stale entries and protects locked ones', async () => {
      const report = await cache.clean({
        maxAgeDays: 30,
        now,
        protect: new Set(['locked@1']),
      });
      expect(report.removed.map((e) => e.name)).toEqual(['old']);
      expect(report.protected.map((e) => e.name)).toEqual(['locked']);
      expect(report.remaining).toBe(2);
      expect(report.freedBytes).toBe(3 + 4);
      expect(await cache.lookup('old', '1')).toBeUndefined();
      expect((await readdir(path.join(root, 'packages'))).sort()).toEqual([
        'fresh',
        'locked',
      ]);
    });

    it('evicts protected entries with force', async () => {
      const report = await cache.clean({
        maxAgeDays: 30,
        now,
        protect: new Set(['locked@1']),
        force: true,
      });
      expect(report.removed.map((e) => e.name)).toEqual(['locked', 'old']);
      expect(report.remaining).toBe(1);
    });

    it('reports without deleting on a dry run', async () => {
      const report = await cache.clean({ maxAgeDays: 30, now, dryRun: true });
      expect(report.removed).toHaveLength(2);
      expect(await cache.lookup('old', '1')).toBeDefined();
    });
  });
});
