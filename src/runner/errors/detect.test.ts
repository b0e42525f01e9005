import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { describeResult, detectFromLog, signalExitCode } from './detect';

describe('detectFromLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-detect-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fails with the mapped exit class', async () => {
    const logPath = path.join(dir, 'a.log');
    await writeFile(
      logPath,
      'file data.csv not found\nr(601);\n\nend of do-file\nr(601);\n',
      'utf8',
    );
    const r = await detectFromLog({ logPath, durationMs: 12 });
    expect(r.success).toBe(false);
    expect(r.exitCode).toBe(3);
    expect(r.durationMs).toBe(12);
    expect(r.logPath).toBe(logPath);
    expect(r.errors[0]?.line).toBe(5);
    expect(describeResult(r)).toBe(
      'r(601) file-not-found: file data.csv not found',
    );
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.errors)).toBe(true);
  });

  it('leaves out the line when the tail window misses the file start', async () => {
    const logPath = path.join(dir, 'long.log');
    await writeFile(
      logPath,
      'x\n'.repeat(100) +
        'file data.csv not found\nr(601);\n\nend of do-file\nr(601);\n',
      'utf8',
    );
    const r = await detectFromLog({
      logPath,
      durationMs: 1,
      tail: { maxLines: 5, chunkSize: 16 },
    });
    expect(r.exitCode).toBe(3);
    expect(r.errors).toHaveLength(1);
    expect(r.errors[0]?.code).toBe(601);
    expect(r.errors[0]?.message).toBe('file data.csv not found');
    expect(r.errors[0]?.line).toBeUndefined();
  });

  it('succeeds with exit 0 on a clean log', async () => {
    const logPath = path.join(dir, 'ok.log');
    await writeFile(logPath, '. display 1\n1\n\nend of do-file\n', 'utf8');
    const r = await detectFromLog({ logPath, durationMs: 1 });
    expect(r.success).toBe(true);
    expect(r.exitCode).toBe(0);
    expect(r.errors).toEqual([]);
  });

  it('reports signals as 128+n, outside the r() space', async () => {
    const logPath = path.join(dir, 'killed.log');
    await writeFile(logPath, 'end of do-file\nr(601);\n', 'utf8');
    const r = await detectFromLog({ logPath, durationMs: 1, signal: 'SIGTERM' });
    expect(r.exitCode).toBe(143);
    expect(r.signal).toBe('SIGTERM');
    expect(r.errors).toEqual([]);
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('flags a missing or unfinished log as incomplete', async () => {
    const missing = await detectFromLog({
      logPath: path.join(dir, 'none.log'),
      durationMs: 1,
    });
    expect(missing.incomplete).toBe(true);
    expect(missing.exitCode).toBe(5);

    const logPath = path.join(dir, 'partial.log');
    await writeFile(logPath, '. sleep 1000\n', 'utf8');
    const partial = await detectFromLog({ logPath, durationMs: 1 });
    expect(partial.success).toBe(false);
    expect(partial.incomplete).toBe(true);
    expect(describeResult(partial)).toBe(
      'log incomplete (no end-of-do-file marker)',
    );
  });
});
