/* src/runner/errors/detect.ts
 * DetectionResult: the authoritative outcome of one interpreter run.
 */
import { existsSync } from 'node:fs';
import { constants } from 'node:os';

import { EXIT } from '@/common/errors';

import type { ErrorOccurrence } from './log-parser';
import { parseLogLines } from './log-parser';
import { readLogTail, type TailOptions } from './log-tail';

export type DetectionResult = Readonly<{
  success: boolean;
  errors: readonly ErrorOccurrence[];
  exitCode: number;
  durationMs: number;
  logPath: string;
  /** Set when the run was terminated by a signal (exit 128+n). */
  signal?: NodeJS.Signals;
  /** No completion marker (or no log at all) and no signal to explain it. */
  incomplete?: boolean;
  /** The run never reached the interpreter (missing script, spawn failure). */
  failure?: string;
}>;

/** Conventional shell status for a signal: 128 + signal number. */
export const signalExitCode = (signal: NodeJS.Signals): number =>
  128 +
  (Object.entries(constants.signals).find(([name]) => name === signal)?.[1] ??
    0);

const freeze = (r: DetectionResult): DetectionResult =>
  Object.freeze({ ...r, errors: Object.freeze([...r.errors]) });

export type DetectInput = {
  logPath: string;
  durationMs: number;
  signal?: NodeJS.Signals | null;
  tail?: TailOptions;
};

/**
 * Build the DetectionResult for a finished run. The process status is never
 * consulted; only a terminating signal overrides the log verdict.
 */
export const detectFromLog = async ({
  logPath,
  durationMs,
  signal,
  tail,
}: DetectInput): Promise<DetectionResult> => {
  if (signal) {
    return freeze({
      success: false,
      errors: [],
      exitCode: signalExitCode(signal),
      durationMs,
      logPath,
      signal,
    });
  }
  if (!existsSync(logPath)) {
    return freeze({
      success: false,
      errors: [],
      exitCode: EXIT.internal,
      durationMs,
      logPath,
      incomplete: true,
    });
  }

  const { lines, firstLine } = await readLogTail(logPath, tail);
  const verdict = parseLogLines(lines, firstLine);
  if (!verdict.completed) {
    return freeze({
      success: false,
      errors: [],
      exitCode: EXIT.internal,
      durationMs,
      logPath,
      incomplete: true,
    });
  }
  const first = verdict.errors[0];
  return freeze({
    success: !first,
    errors: verdict.errors,
    exitCode: first ? first.exitCode : EXIT.success,
    durationMs,
    logPath,
  });
};

/** Human line for a result (CLI summary). */
export const describeResult = (r: DetectionResult): string => {
  if (r.success) return 'success';
  if (r.failure) return r.failure;
  if (r.signal) return `terminated by ${r.signal}`;
  if (r.incomplete) return 'log incomplete (no end-of-do-file marker)';
  const e = r.errors[0];
  return e ? `r(${String(e.code)}) ${e.name}: ${e.message}` : 'failed';
};
