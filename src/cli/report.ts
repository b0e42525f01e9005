/* src/cli/report.ts
 * Render run results and batch outcomes (human or JSON) and set the exit code.
 */
import type { BatchOutcome, BenchOutcome } from '@/runner/exec/orchestrator';
import type { OutputMode, RunResult } from '@/runner/exec/run-one';
import { bold, dim, error, ok, warn } from '@/runner/util/color';

import {
  emitJson,
  failureDetails,
  fmtSeconds,
  type OutputFormat,
  renderTable,
  resultJson,
  resultLine,
  say,
} from './output';

export type ModeFlags = { quiet?: boolean; verbose?: boolean; profile?: boolean };

/** Quiet beats verbose beats profile. */
export const outputModeOf = (flags: ModeFlags): OutputMode =>
  flags.quiet ? 'quiet' : flags.verbose ? 'verbose' : flags.profile ? 'profile' : 'default';

const runJson = (r: RunResult): Record<string, unknown> => ({
  id: r.id,
  script: r.script,
  ...resultJson(r),
  ...(r.timedOut ? { timedOut: true } : {}),
  phases: {
    prepareMs: Math.round(r.phases.prepareMs),
    executeMs: Math.round(r.phases.executeMs),
    parseMs: Math.round(r.phases.parseMs),
  },
});

/** Live line for one finished run (batch progress). */
export const printRunLine = (r: RunResult, mode: OutputMode): void => {
  if (mode === 'quiet') return;
  say(resultLine(r.id, r) + (r.timedOut ? ` ${warn('(timed out)')}` : ''));
  if (!r.success) failureDetails(r).forEach((l) => console.log(l));
  if (mode === 'profile')
    console.log(
      dim(
        `  prepare ${fmtSeconds(r.phases.prepareMs)}, execute ${fmtSeconds(
          r.phases.executeMs,
        )}, parse ${fmtSeconds(r.phases.parseMs)}`,
      ),
    );
};

export const reportRun = (r: RunResult, mode: OutputMode, format: OutputFormat): void => {
  process.exitCode = r.exitCode;
  if (format === 'json') {
    emitJson(runJson(r));
    return;
  }
  printRunLine(r, mode);
};

/**
 * Summary of a batch. Per-run lines are printed as results arrive; this adds
 * the table and the totals.
 */
export const reportBatch = (
  out: BatchOutcome,
  mode: OutputMode,
  format: OutputFormat,
  extra: Record<string, unknown> = {},
): void => {
  process.exitCode = out.exitCode;
  if (format === 'json') {
    emitJson({
      ...extra,
      success: out.success,
      exitCode: out.exitCode,
      durationMs: Math.round(out.durationMs),
      successCount: out.succeeded.length,
      failedCount: out.failed.length,
      succeeded: out.succeeded,
      failed: out.failed,
      skipped: out.skipped,
      cancelled: out.cancelled,
      results: out.results.map(runJson),
    });
    return;
  }
  if (mode === 'quiet') return;
  if (out.results.length > 1)
    console.log(
      renderTable(
        ['Script', 'Status', 'Time', 'Exit'],
        out.results.map((r) => [
          r.id,
          r.success ? ok('ok') : error('failed'),
          fmtSeconds(r.durationMs),
          String(r.exitCode),
        ]),
      ),
    );
  if (out.skipped.length) say(`${warn('skipped')}: ${out.skipped.join(', ')}`);
  if (out.cancelled) say(warn('cancelled'));
  say(
    `${bold(String(out.succeeded.length))} passed, ${bold(
      String(out.failed.length),
    )} failed in ${fmtSeconds(out.durationMs)}`,
  );
};

export const reportBench = (
  label: string,
  out: BenchOutcome,
  format: OutputFormat,
): void => {
  process.exitCode = out.exitCode;
  if (format === 'json') {
    emitJson({
      script: label,
      success: out.success,
      exitCode: out.exitCode,
      warmup: out.warmup,
      runs: out.runs.length,
      cancelled: out.cancelled,
      stats: out.stats,
      failures: out.runs.filter((r) => !r.success).map(runJson),
    });
    return;
  }
  const s = out.stats;
  const sec = (v: number): string => `${v.toFixed(3)}s`;
  say(`${bold(label)}: ${String(s.count)} runs after ${String(out.warmup)} warmup`);
  console.log(
    renderTable(
      ['Mean', 'Median', 'Min', 'Max', 'Stddev'],
      [[sec(s.mean), sec(s.median), sec(s.min), sec(s.max), sec(s.stddev)]],
    ),
  );
  const failures = out.runs.filter((r) => !r.success);
  if (failures.length) say(error(`${String(failures.length)} measured run(s) failed`));
  if (out.cancelled) say(warn('cancelled'));
};
