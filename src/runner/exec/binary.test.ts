import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EnvironmentError } from '@/common/errors';

import { detectBinary, findInPath } from './binary';

describe.skipIf(process.platform === 'win32')('detectBinary', () => {
  let dir: string;
  const exe = async (name: string): Promise<string> => {
    const p = path.join(dir, name);
    await writeFile(p, '#!/bin/sh\n', 'utf8');
    await chmod(p, 0o755);
    return p;
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-bin-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prefers the explicit engine', async () => {
    const flag = await exe('mine');
    const env = await exe('from-env');
    expect(
      detectBinary({ explicit: flag, env: { STATA_BINARY: env }, installLocations: [] }),
    ).toEqual({ path: flag, source: 'flag' });
  });

  it('uses $STATA_BINARY before the user config', async () => {
    const env = await exe('from-env');
    const cfg = await exe('from-config');
    expect(
      detectBinary({ env: { STATA_BINARY: env }, configured: cfg, installLocations: [] }),
    ).toEqual({ path: env, source: 'env' });
  });

  it('fails loudly when a pinned binary is missing', () => {
    expect(() =>
      detectBinary({ explicit: path.join(dir, 'absent'), env: {}, installLocations: [] }),
    ).toThrow(EnvironmentError);
  });

  it('tries install locations, then PATH in preference order', async () => {
    const installed = await exe('installed');
    expect(detectBinary({ env: {}, installLocations: [installed] })).toEqual({
      path: installed,
      source: 'install',
    });

    const se = await exe('stata-se');
    await exe('stata');
    expect(detectBinary({ env: { PATH: dir }, installLocations: [] })).toEqual({
      path: se,
      source: 'path',
    });
  });

  it('skips non-executable files on PATH', async () => {
    await writeFile(path.join(dir, 'stata-mp'), '', 'utf8');
    expect(findInPath('stata-mp', { PATH: dir }, 'linux')).toBeUndefined();
  });

  it('reports every place it looked when nothing is found', () => {
    expect(() => detectBinary({ env: { PATH: dir }, installLocations: [] })).toThrow(
      /no Stata binary found/,
    );
  });
});
