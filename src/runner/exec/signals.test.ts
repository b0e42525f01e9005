import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { fakeEngine } from '@/test/fake-engine';

import { runParallel } from './orchestrator';
import { attachSessionSignals } from './signals';
import { ProcessSupervisor } from './supervisor';

describe.skipIf(process.platform === 'win32')('attachSessionSignals', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-signals-'));
    await writeFile(path.join(dir, 'hang.do'), 'hang\n', 'utf8');
    await writeFile(path.join(dir, 'later.do'), 'display "later"\n', 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('aborts the session and kills running children on SIGINT', async () => {
    const controller = new AbortController();
    const supervisor = new ProcessSupervisor(1_000);
    const before = process.listenerCount('SIGINT');
    const detach = attachSessionSignals({ controller, supervisor });
    expect(process.listenerCount('SIGINT')).toBe(before + 1);

    const timer = setTimeout(() => {
      process.emit('SIGINT', 'SIGINT');
    }, 400);
    try {
      const out = await runParallel(
        [
          { script: 'hang.do', cwd: dir },
          { script: 'later.do', cwd: dir },
        ],
        { engine: fakeEngine, signal: controller.signal, supervisor },
        1,
      );
      expect(controller.signal.aborted).toBe(true);
      expect(supervisor.isCancelled).toBe(true);
      expect(out.cancelled).toBe(true);
      expect(out.results).toHaveLength(1);
      const [hung] = out.results;
      expect(hung?.signal).toBe('SIGTERM');
      expect([130, 143]).toContain(hung?.exitCode);
      expect(out.skipped).toEqual(['later.do']);
      expect(supervisor.tracked()).toEqual([]);
    } finally {
      clearTimeout(timer);
      detach();
    }
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
