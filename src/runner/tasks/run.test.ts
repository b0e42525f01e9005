import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { fakeEngine } from '@/test/fake-engine';

import type { TaskTable } from './graph';
import { planTask } from './plan';
import { runTask } from './run';

describe('runTask', () => {
  let dir: string;
  const tasks: TaskTable = {
    prep: 'prep.do',
    bad: 'bad.do',
    seq: ['prep', 'bad', 'after.do'],
    par: { parallel: ['bad', 'prep'] },
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-task-'));
    await writeFile(path.join(dir, 'prep.do'), 'display "prep"\n', 'utf8');
    await writeFile(path.join(dir, 'bad.do'), 'error 601\n', 'utf8');
    await writeFile(path.join(dir, 'after.do'), 'display "after"\n', 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stops a sequence at the first failure', async () => {
    const out = await runTask(planTask(tasks, 'seq', { root: dir }), { engine: fakeEngine });
    expect(out).toMatchObject({
      task: 'seq',
      success: false,
      exitCode: 3,
      succeeded: ['prep'],
      failed: ['bad'],
      skipped: ['after.do'],
      cancelled: false,
    });
  });

  it('runs every step of a parallel group', async () => {
    const out = await runTask(
      planTask(tasks, 'par', { root: dir }),
      { engine: fakeEngine },
      { jobs: 2 },
    );
    expect(out.results.map((r) => r.id)).toEqual(['bad', 'prep']);
    expect(out).toMatchObject({ success: false, failed: ['bad'], succeeded: ['prep'], skipped: [] });
  });

  it('starts nothing once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const out = await runTask(planTask(tasks, 'seq', { root: dir }), {
      engine: fakeEngine,
      signal: controller.signal,
    });
    expect(out).toMatchObject({
      results: [],
      skipped: ['prep', 'bad', 'after.do'],
      cancelled: true,
      exitCode: 130,
    });
  });
});
