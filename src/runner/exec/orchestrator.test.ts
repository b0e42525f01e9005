import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileError } from '@/common/errors';

import { fakeEngine } from '@/test/fake-engine';

import {
  assertScriptsExist,
  runBench,
  runParallel,
  runSequential,
} from './orchestrator';
import { ProcessSupervisor } from './supervisor';

describe('orchestrator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-orch-'));
    await writeFile(path.join(dir, 'a.do'), 'display "a"\n', 'utf8');
    await writeFile(path.join(dir, 'b.do'), 'error 198\n', 'utf8');
    await writeFile(path.join(dir, 'c.do'), 'display "c"\n', 'utf8');
    await writeFile(path.join(dir, 'd.do'), 'display "d"\n', 'utf8');
    await writeFile(path.join(dir, 'e.do'), 'display "e"\n', 'utf8');
    await writeFile(path.join(dir, 'h1.do'), 'hang\n', 'utf8');
    await writeFile(path.join(dir, 'h2.do'), 'hang\n', 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const reqs = (...names: string[]) => names.map((script) => ({ script, cwd: dir }));

  it('stops a sequential batch at the first failure', async () => {
    const out = await runSequential(reqs('a.do', 'b.do', 'c.do'), { engine: fakeEngine });
    expect(out.results.map((r) => r.id)).toEqual(['a.do', 'b.do']);
    expect(out.skipped).toEqual(['c.do']);
    expect(out).toMatchObject({
      success: false,
      exitCode: 2,
      succeeded: ['a.do'],
      failed: ['b.do'],
      cancelled: false,
    });
  });

  it('runs every parallel request and lists results in request order', async () => {
    const seen: string[] = [];
    const out = await runParallel(
      reqs('a.do', 'b.do', 'c.do'),
      { engine: fakeEngine },
      2,
      (r) => seen.push(r.id),
    );
    expect(out.results.map((r) => r.id)).toEqual(['a.do', 'b.do', 'c.do']);
    expect(seen.sort()).toEqual(['a.do', 'b.do', 'c.do']);
    expect(out).toMatchObject({
      success: false,
      exitCode: 2,
      succeeded: ['a.do', 'c.do'],
      failed: ['b.do'],
      skipped: [],
    });
  });

  it('completes every request when the third of five fails', async () => {
    const out = await runParallel(
      reqs('a.do', 'c.do', 'b.do', 'd.do', 'e.do'),
      { engine: fakeEngine },
      2,
    );
    expect(out.failed).toEqual(['b.do']);
    expect(out.succeeded).toEqual(['a.do', 'c.do', 'd.do', 'e.do']);
    expect(out.skipped).toEqual([]);
    expect(out.results).toHaveLength(5);
  });

  it('reports a missing script as one failed result in a parallel batch', async () => {
    const out = await runParallel(
      reqs('a.do', 'c.do', 'missing.do', 'd.do', 'e.do'),
      { engine: fakeEngine },
      2,
    );
    expect(out.results.map((r) => r.id)).toEqual([
      'a.do',
      'c.do',
      'missing.do',
      'd.do',
      'e.do',
    ]);
    expect(out).toMatchObject({
      success: false,
      exitCode: 3,
      succeeded: ['a.do', 'c.do', 'd.do', 'e.do'],
      failed: ['missing.do'],
      skipped: [],
    });
    expect(out.results[2]).toMatchObject({
      success: false,
      exitCode: 3,
      errors: [],
      failure: 'script not found: missing.do',
    });
  });

  it('keeps the partial results when a sequential batch hits a missing script', async () => {
    const out = await runSequential(reqs('a.do', 'missing.do', 'c.do'), {
      engine: fakeEngine,
    });
    expect(out.results.map((r) => [r.id, r.exitCode])).toEqual([
      ['a.do', 0],
      ['missing.do', 3],
    ]);
    expect(out.skipped).toEqual(['c.do']);
  });

  it('names every missing script before a batch starts', async () => {
    await expect(assertScriptsExist(reqs('a.do', 'x.do', 'y.do'))).rejects.toThrow(
      new FileError('scripts not found: x.do, y.do', path.join(dir, 'x.do')),
    );
    await expect(assertScriptsExist(reqs('a.do', 'c.do'))).resolves.toBeUndefined();
    await expect(
      assertScriptsExist([{ code: 'display 1', cwd: dir }]),
    ).resolves.toBeUndefined();
  });

  it('starts nothing once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const out = await runParallel(reqs('a.do', 'c.do'), {
      engine: fakeEngine,
      signal: controller.signal,
    });
    expect(out).toMatchObject({
      success: false,
      cancelled: true,
      exitCode: 130,
      results: [],
      skipped: ['a.do', 'c.do'],
    });
  });

  it('terminates in-flight children on abort and leaves none behind', async () => {
    const controller = new AbortController();
    const supervisor = new ProcessSupervisor(1_000);
    setTimeout(() => {
      controller.abort();
    }, 400);
    const out = await runParallel(
      reqs('h1.do', 'h2.do', 'a.do'),
      { engine: fakeEngine, signal: controller.signal, supervisor },
      2,
    );
    expect(out.results.map((r) => [r.id, r.signal, r.exitCode])).toEqual([
      ['h1.do', 'SIGTERM', 143],
      ['h2.do', 'SIGTERM', 143],
    ]);
    expect(out.skipped).toEqual(['a.do']);
    expect(supervisor.tracked()).toEqual([]);
  });

  it('benchmarks measured runs after discarded warmups', async () => {
    const phases: string[] = [];
    const out = await runBench(
      { script: 'a.do', cwd: dir },
      { engine: fakeEngine },
      { warmup: 1, runs: 3 },
      (_r, phase) => phases.push(phase),
    );
    expect(phases).toEqual(['warmup', 'measure', 'measure', 'measure']);
    expect(out.success).toBe(true);
    expect(out.runs).toHaveLength(3);
    expect(out.stats.count).toBe(3);
    expect(out.stats.min).toBeLessThanOrEqual(out.stats.median);
    expect(out.stats.median).toBeLessThanOrEqual(out.stats.max);
  });

  it('marks a benchmark with a failing run unsuccessful but keeps its stats', async () => {
    const out = await runBench(
      { script: 'b.do', cwd: dir },
      { engine: fakeEngine },
      { warmup: 0, runs: 2 },
    );
    expect(out.success).toBe(false);
    expect(out.exitCode).toBe(2);
    expect(out.stats.count).toBe(2);
  });
});
