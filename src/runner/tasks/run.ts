/* src/runner/tasks/run.ts
 * Execute a task plan: sequences stop at the first failure, parallel groups
 * run every step. At most `jobs` interpreters run at once across the tree.
 */
import {
  type BatchOutcome,
  batchOutcome,
  defaultJobs,
  requestId,
  runSettled,
} from '@/runner/exec/orchestrator';
import type { RunContext, RunResult } from '@/runner/exec/run-one';
import { yieldToEventLoop } from '@/runner/exec/util';

import { planRequests, type TaskPlan } from './plan';

export type TaskOutcome = BatchOutcome & { task: string };

export type TaskRunOptions = {
  jobs?: number;
  onResult?: (r: RunResult) => void;
};

type Fragment = { results: RunResult[]; skipped: string[] };

const skip = (plan: TaskPlan): Fragment => ({
  results: [],
  skipped: planRequests(plan).map(requestId),
});

const merge = (parts: readonly Fragment[]): Fragment => ({
  results: parts.flatMap((p) => p.results),
  skipped: parts.flatMap((p) => p.skipped),
});

/** Counting gate shared by every script step of one task run. */
const gate = (width: number) => {
  let active = 0;
  const waiting: Array<() => void> = [];
  return {
    acquire: (): Promise<void> => {
      if (active < width) {
        active += 1;
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => waiting.push(resolve));
    },
    release: (): void => {
      const next = waiting.shift();
      if (next) next();
      else active -= 1;
    },
  };
};

export const runTask = async (
  plan: TaskPlan,
  ctx: RunContext,
  opts: TaskRunOptions = {},
): Promise<TaskOutcome> => {
  const startedAt = performance.now();
  const slots = gate(Math.max(1, opts.jobs ?? defaultJobs()));

  const exec = async (step: TaskPlan): Promise<Fragment> => {
    switch (step.kind) {
      case 'script': {
        await slots.acquire();
        try {
          if (ctx.signal?.aborted) return skip(step);
          const r = await runSettled(step.request, ctx);
          opts.onResult?.(r);
          return { results: [r], skipped: [] };
        } finally {
          slots.release();
        }
      }
      case 'sequence': {
        const parts: Fragment[] = [];
        let failed = false;
        for (const s of step.steps) {
          await yieldToEventLoop();
          if (failed || ctx.signal?.aborted) {
            parts.push(skip(s));
            continue;
          }
          const part = await exec(s);
          parts.push(part);
          failed = part.results.some((r) => !r.success);
        }
        return merge(parts);
      }
      case 'parallel':
        return merge(await Promise.all(step.steps.map(exec)));
    }
  };

  const { results, skipped } = await exec(plan);
  return {
    ...batchOutcome(results, skipped, ctx.signal?.aborted ?? false, startedAt),
    task: plan.task,
  };
};
