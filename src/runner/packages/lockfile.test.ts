import { describe, expect, it } from 'vitest';

import { LockfileError } from '@/common/errors';

import {
  manifestHash,
  parseLockfile,
  serializeLockfile,
  verifyLockfile,
} from './lockfile';
import type { Lockfile } from './types';

const SUM = `sha256:${'a'.repeat(64)}`;

const lock = (packages: Lockfile['packages'], hash: string): Lockfile => ({
  version: '1',
  tool: '0.1.0',
  manifestHash: hash,
  packages,
});

describe('serializeLockfile', () => {
  it('sorts keys at every level and ends with a newline', () => {
    const text = serializeLockfile(
      lock(
        {
          zed: { version: '2', source: { type: 'ssc' }, checksum: SUM, group: 'dev' },
          abc: { version: '1', source: { type: 'ssc' }, checksum: SUM, group: 'production' },
        },
        'h',
      ),
    );
    expect(text.endsWith('}\n')).toBe(true);
    expect(text.indexOf('"abc"')).toBeLessThan(text.indexOf('"zed"'));
    expect(text.split('\n').slice(0, 4)).toEqual([
      '{',
      '  "manifestHash": "h",',
      '  "packages": {',
      '    "abc": {',
    ]);
  });
});

describe('parseLockfile', () => {
  it('rejects malformed JSON', () => {
    expect(() => parseLockfile('{', 'x.lock')).toThrow(LockfileError);
  });

  it('names the offending field', () => {
    const bad = JSON.stringify(
      lock({ a: { version: '1', source: { type: 'ssc' }, checksum: 'md5:1', group: 'dev' } }, 'h'),
    );
    expect(() => parseLockfile(bad, 'x.lock')).toThrow(
      'x.lock: packages.a.checksum: expected sha256:<hex>',
    );
  });
});

describe('manifestHash', () => {
  it('ignores key order and missing sections', () => {
    expect(manifestHash({ dependencies: { a: 'ssc', b: 'ssc' } })).toBe(
      manifestHash({ dependencies: { b: 'ssc', a: 'ssc' }, dev: {}, test: {} }),
    );
    expect(manifestHash(undefined)).toBe(manifestHash({}));
  });
});

describe('verifyLockfile', () => {
  it('itemizes added, removed and changed packages', () => {
    const packages = {
      dependencies: { keep: 'ssc', moved: 'github:someone/moved', fresh: 'ssc' },
      test: { regroup: 'ssc' },
    };
    const l = lock(
      {
        keep: { version: '1', source: { type: 'ssc' }, checksum: SUM, group: 'production' },
        moved: { version: '1', source: { type: 'ssc' }, checksum: SUM, group: 'production' },
        regroup: { version: '1', source: { type: 'ssc' }, checksum: SUM, group: 'production' },
        gone: { version: '1', source: { type: 'ssc' }, checksum: SUM, group: 'dev' },
      },
      manifestHash(packages),
    );
    expect(verifyLockfile(packages, l)).toEqual({
      inSync: false,
      added: ['fresh'],
      removed: ['gone'],
      changed: [
        { name: 'moved', reason: 'source changed' },
        { name: 'regroup', reason: 'group changed (production -> test)' },
      ],
      manifestChanged: false,
    });
  });

  it('accepts a github lock pinned to a commit when no ref was declared', () => {
    const packages = { dependencies: { t: 'github:someone/t' } };
    const l = lock(
      {
        t: {
          version: '20240101',
          source: { type: 'github', repo: 'someone/t', ref: 'main', commit: 'abcdef12' },
          checksum: SUM,
          group: 'production',
        },
      },
      manifestHash(packages),
    );
    expect(verifyLockfile(packages, l).inSync).toBe(true);
  });
});
