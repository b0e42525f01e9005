/* src/cli/output.ts
 * Console output: tables, JSON payloads, failure reporting and exit codes.
 */
import { type Command, Option } from 'commander';
import { getBorderCharacters, table } from 'table';

import { exitCodeOf, ReproError } from '@/common/errors';
import { describeResult, type DetectionResult } from '@/runner/errors/detect';
import { bold, dim, error, ok, warn } from '@/runner/util/color';

export type OutputFormat = 'human' | 'json';

export type FormatFlags = { format?: string; json?: boolean };

/** `--json` wins over `--format`; anything but "json" is human output. */
export const formatOf = (flags: FormatFlags): OutputFormat =>
  flags.json === true || flags.format === 'json' ? 'json' : 'human';

/** `--format human|json` and `--json`. */
export const addFormatOptions = (cmd: Command): Command =>
  cmd
    .addOption(
      new Option('--format <format>', 'output format')
        .choices(['human', 'json'])
        .default('human'),
    )
    .option('--json', 'same as --format json');

export const emitJson = (payload: unknown): void => {
  console.log(JSON.stringify(payload, null, 2));
};

export const say = (line: string): void => {
  console.log(`strepro: ${line}`);
};

/** Borderless, left-aligned table with a bold header row. */
export const renderTable = (header: readonly string[], rows: readonly string[][]): string =>
  table([header.map((h) => bold(h)), ...rows], {
    border: getBorderCharacters('void'),
    columnDefault: { paddingLeft: 0, paddingRight: 2 },
    drawHorizontalLine: () => false,
  }).trimEnd();

export const fmtSeconds = (ms: number): string => `${(ms / 1000).toFixed(2)}s`;

export const fmtBytes = (n: number): string => {
  if (n < 1024) return `${String(n)} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KiB`;
  return `${(n / (1024 * 1024)).toFixed(1)} MiB`;
};

/** One summary line for a finished run. */
export const resultLine = (label: string, r: DetectionResult): string => {
  const status = r.success ? ok('ok') : error('failed');
  return `${label}: ${status} in ${fmtSeconds(r.durationMs)} (exit ${String(r.exitCode)})${
    r.success ? '' : ` ${describeResult(r)}`
  }`;
};

/** Detail lines for a failed run: code, name, doc reference. */
export const failureDetails = (r: DetectionResult): string[] =>
  r.errors.flatMap((e) => [
    `  ${error(`r(${String(e.code)})`)} ${e.name} [${e.category}]${
      e.line !== undefined ? ` at ${r.logPath}:${String(e.line)}` : ''
    }`,
    `  ${e.message}`,
    `  ${dim(e.docRef)}`,
  ]);

/** JSON view of a DetectionResult (errors flattened to plain records). */
export const resultJson = (r: DetectionResult): Record<string, unknown> => ({
  success: r.success,
  exitCode: r.exitCode,
  durationMs: Math.round(r.durationMs),
  logPath: r.logPath,
  ...(r.signal ? { signal: r.signal } : {}),
  ...(r.incomplete ? { incomplete: true } : {}),
  ...(r.failure ? { failure: r.failure } : {}),
  errors: r.errors.map((e) => ({
    code: e.code,
    name: e.name,
    category: e.category,
    message: e.message,
    docRef: e.docRef,
    exitCode: e.exitCode,
    ...(e.line !== undefined ? { line: e.line } : {}),
  })),
});

/**
 * Report a thrown value and set the process exit code. ReproErrors carry
 * their own code; anything else is an internal failure.
 */
export const reportFailure = (e: unknown, format: OutputFormat = 'human'): void => {
  const exitCode = exitCodeOf(e);
  process.exitCode = exitCode;
  const message = e instanceof Error ? e.message : String(e);
  if (format === 'json') {
    emitJson({
      success: false,
      exitCode,
      error: { kind: e instanceof ReproError ? e.name : 'InternalError', message },
    });
    return;
  }
  const text = message.startsWith('strepro:') ? message : `strepro: ${message}`;
  console.error(e instanceof ReproError ? error(text) : warn(text));
};

/** Wrap an async action so failures map to exit codes instead of throwing. */
export const guard =
  <A extends unknown[]>(
    format: (...args: A) => OutputFormat,
    action: (...args: A) => Promise<void> | void,
  ) =>
  async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (e) {
      reportFailure(e, format(...args));
    }
  };
