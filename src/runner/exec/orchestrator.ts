/* src/runner/exec/orchestrator.ts
 * Sequential (fail-fast), parallel (bounded pool) and benchmark execution.
 * Nothing queued starts after the context's AbortSignal fires.
 */
import os from 'node:os';
import path from 'node:path';

import { pathExists } from 'fs-extra';

import { EXIT, FileError, ReproError } from '@/common/errors';
import { signalExitCode } from '@/runner/errors/detect';

import {
  logPathFor,
  type RunContext,
  type RunRequest,
  type RunResult,
  runOne,
} from './run-one';
import { type BenchStats, summarizeSamples } from './stats';
import { yieldToEventLoop } from './util';

export const requestId = (r: RunRequest): string => r.id ?? r.script ?? '<inline>';

/**
 * Check every script of a batch before the first one starts. Throws one
 * FileError naming all missing scripts.
 */
export const assertScriptsExist = async (
  requests: readonly RunRequest[],
): Promise<void> => {
  const missing: Array<{ script: string; target: string }> = [];
  for (const r of requests) {
    if (r.code !== undefined || r.script === undefined) continue;
    const target = path.resolve(r.cwd, r.script);
    if (!(await pathExists(target))) missing.push({ script: r.script, target });
  }
  const [first] = missing;
  if (!first) return;
  throw new FileError(
    missing.length === 1
      ? `script not found: ${first.script}`
      : `scripts not found: ${missing.map((m) => m.script).join(', ')}`,
    first.target,
  );
};

/** A request that failed before the interpreter produced a verdict. */
export const failedRun = (req: RunRequest, e: ReproError): RunResult => ({
  success: false,
  errors: [],
  exitCode: e.exitCode,
  durationMs: 0,
  logPath: req.script ? logPathFor(req.cwd, req.script) : '',
  failure: e.message,
  id: requestId(req),
  script: req.script ?? '<inline>',
  phases: { prepareMs: 0, executeMs: 0, parseMs: 0 },
});

/**
 * runOne for batches: a tool-level failure of one request becomes its
 * failed result, so the rest of the batch still aggregates.
 */
export const runSettled = async (
  req: RunRequest,
  ctx: RunContext,
): Promise<RunResult> => {
  try {
    return await runOne(req, ctx);
  } catch (e) {
    if (e instanceof ReproError) return failedRun(req, e);
    throw e;
  }
};

export type BatchOutcome = {
  success: boolean;
  /** First failure's code in request order; 0 on success. */
  exitCode: number;
  results: RunResult[];
  succeeded: string[];
  failed: string[];
  /** Never started (after a failure in sequential mode, or after abort). */
  skipped: string[];
  cancelled: boolean;
  durationMs: number;
};

/** Fold results into a BatchOutcome (first failure in list order sets the code). */
export const batchOutcome = (
  results: RunResult[],
  skipped: string[],
  cancelled: boolean,
  startedAt: number,
): BatchOutcome => {
  const failedRuns = results.filter((r) => !r.success);
  const first = failedRuns[0];
  const exitCode = first
    ? first.exitCode
    : cancelled
      ? signalExitCode('SIGINT')
      : EXIT.success;
  return {
    success: !first && !cancelled,
    exitCode,
    results,
    succeeded: results.filter((r) => r.success).map((r) => r.id),
    failed: failedRuns.map((r) => r.id),
    skipped,
    cancelled,
    durationMs: performance.now() - startedAt,
  };
};

/** Strictly in order; stops at the first failure. */
export const runSequential = async (
  requests: readonly RunRequest[],
  ctx: RunContext,
  onResult?: (r: RunResult) => void,
): Promise<BatchOutcome> => {
  const startedAt = performance.now();
  const results: RunResult[] = [];
  let next = 0;
  for (; next < requests.length; next += 1) {
    await yieldToEventLoop();
    if (ctx.signal?.aborted) break;
    const req = requests[next];
    if (!req) continue;
    const r = await runSettled(req, ctx);
    results.push(r);
    onResult?.(r);
    if (!r.success) {
      next += 1;
      break;
    }
  }
  const skipped = requests.slice(next).map(requestId);
  return batchOutcome(results, skipped, ctx.signal?.aborted ?? false, startedAt);
};

export const defaultJobs = (): number => Math.max(1, os.availableParallelism());

/**
 * Bounded pool: every request runs regardless of other failures. Results are
 * listed in request order.
 */
export const runParallel = async (
  requests: readonly RunRequest[],
  ctx: RunContext,
  jobs = defaultJobs(),
  onResult?: (r: RunResult) => void,
): Promise<BatchOutcome> => {
  const startedAt = performance.now();
  const slots: Array<RunResult | undefined> = new Array<RunResult | undefined>(
    requests.length,
  ).fill(undefined);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    for (;;) {
      if (ctx.signal?.aborted) return;
      const i = cursor;
      cursor += 1;
      const req = requests[i];
      if (!req) return;
      const r = await runSettled(req, ctx);
      slots[i] = r;
      onResult?.(r);
    }
  };

  const width = Math.max(1, Math.min(jobs, requests.length));
  await Promise.all(Array.from({ length: width }, () => worker()));

  const results: RunResult[] = [];
  const skipped: string[] = [];
  requests.forEach((req, i) => {
    const r = slots[i];
    if (r) results.push(r);
    else skipped.push(requestId(req));
  });
  return batchOutcome(results, skipped, ctx.signal?.aborted ?? false, startedAt);
};

export type BenchOptions = { warmup?: number; runs?: number };
export const DEFAULT_WARMUP = 2;
export const DEFAULT_RUNS = 10;

export type BenchOutcome = {
  success: boolean;
  exitCode: number;
  warmup: number;
  /** Measured runs only. */
  runs: RunResult[];
  /** Seconds over measured runs. */
  stats: BenchStats;
  cancelled: boolean;
};

/** Warmups (discarded) then measured runs of one request. */
export const runBench = async (
  req: RunRequest,
  ctx: RunContext,
  opts: BenchOptions = {},
  onRun?: (r: RunResult, phase: 'warmup' | 'measure', index: number) => void,
): Promise<BenchOutcome> => {
  const warmup = opts.warmup ?? DEFAULT_WARMUP;
  const count = opts.runs ?? DEFAULT_RUNS;
  const runs: RunResult[] = [];

  for (let i = 0; i < warmup && !ctx.signal?.aborted; i += 1)
    onRun?.(await runOne(req, ctx), 'warmup', i);
  for (let i = 0; i < count && !ctx.signal?.aborted; i += 1) {
    const r = await runOne(req, ctx);
    runs.push(r);
    onRun?.(r, 'measure', i);
  }

  const cancelled = ctx.signal?.aborted ?? false;
  const firstFailure = runs.find((r) => !r.success);
  return {
    success: !firstFailure && !cancelled,
    exitCode: firstFailure
      ? firstFailure.exitCode
      : cancelled
        ? signalExitCode('SIGINT')
        : EXIT.success,
    warmup,
    runs,
    stats: summarizeSamples(runs.map((r) => r.durationMs / 1000)),
    cancelled,
  };
};
