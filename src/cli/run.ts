/* src/cli/run.ts
 * `strepro run`: one script, inline code, or several scripts in sequence or
 * in parallel, with isolation from the lockfile.
 */
import type { Command } from 'commander';

import { EnvironmentError } from '@/common/errors';
import {
  assertScriptsExist,
  runParallel,
  runSequential,
} from '@/runner/exec/orchestrator';
import {
  parseArgPairs,
  type RunRequest,
  type RunResult,
  runOne,
} from '@/runner/exec/run-one';
import type { DependencyGroup } from '@/runner/packages/types';

import {
  collect,
  nonNegativeInt,
  parseGroups,
  positiveInt,
  positiveNumber,
} from './cli-utils';
import { addFormatOptions, formatOf, type FormatFlags, guard } from './output';
import {
  type ModeFlags,
  outputModeOf,
  printRunLine,
  reportBatch,
  reportRun,
} from './report';
import {
  engineFor,
  isolationFor,
  jobsFor,
  openWorkspace,
  runDirs,
  timeoutFor,
  withCancellation,
} from './session';

export type RunFlags = FormatFlags &
  ModeFlags & {
    code?: string;
    arg?: string[];
    trace?: number;
    timeout?: number;
    engine?: string;
    parallel?: boolean;
    jobs?: number;
    keepLog?: boolean;
    group?: DependencyGroup[];
    allowGlobal?: boolean;
  };

/** Options shared by commands that execute scripts. */
export const addExecOptions = (cmd: Command): Command =>
  addFormatOptions(cmd)
    .option('--engine <path>', 'interpreter binary (default: detected)')
    .option(
      '--timeout <seconds>',
      'terminate a run after this many seconds',
      positiveNumber('--timeout'),
    )
    .option(
      '--group <groups>',
      'isolate to these dependency groups (comma-separated)',
      parseGroups,
    )
    .option('--allow-global', 'search SITE, PERSONAL, PLUS and OLDPLACE after BASE')
    .option('-q, --quiet', 'print nothing but failures')
    .option('-v, --verbose', 'stream the log while the script runs')
    .option('--profile', 'print phase timings');

export const runAction = async (scripts: string[], flags: RunFlags): Promise<void> => {
  const format = formatOf(flags);
  const mode = format === 'json' ? 'quiet' : outputModeOf(flags);
  if (!scripts.length && flags.code === undefined)
    throw new EnvironmentError('nothing to run: give a script or -c <code>');
  if (scripts.length && flags.code !== undefined)
    throw new EnvironmentError('give scripts or -c <code>, not both');

  const ws = await openWorkspace();
  const engine = engineFor(ws, flags);
  const adoPath = await isolationFor(ws, flags);
  const timeoutMs = timeoutFor(ws, flags.timeout);
  const args = parseArgPairs(flags.arg ?? []);
  const base: Omit<RunRequest, 'script' | 'code'> = {
    ...runDirs(ws),
    ...(Object.keys(args).length ? { args } : {}),
    ...(flags.trace !== undefined ? { trace: flags.trace } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(flags.keepLog ? { keepLog: true } : {}),
    ...(adoPath ? { adoPath } : {}),
  };
  const requests: RunRequest[] =
    flags.code !== undefined
      ? [{ ...base, code: flags.code }]
      : scripts.map((script) => ({ ...base, script }));
  await assertScriptsExist(requests);

  await withCancellation(
    {
      engine,
      output: mode,
      onLogLine: (line) => {
        console.log(line);
      },
    },
    async (ctx) => {
      const [only] = requests;
      if (only && requests.length === 1) {
        reportRun(await runOne(only, ctx), mode, format);
        return;
      }
      const onResult = (r: RunResult): void => {
        printRunLine(r, mode);
      };
      const out = flags.parallel
        ? await runParallel(requests, ctx, jobsFor(ws, flags.jobs), onResult)
        : await runSequential(requests, ctx, onResult);
      reportBatch(out, mode, format);
    },
  );
};

export const registerRun = (cli: Command): Command => {
  const sub = cli
    .command('run')
    .description('run do-files in batch mode and report the verdict from the log')
    .argument('[scripts...]', 'do-files to run (in order unless --parallel)')
    .option('-c, --code <code>', 'run inline code instead of a file')
    .option(
      '--arg <KEY=VALUE>',
      'pass STREPRO_ARG_<KEY> to the script (repeatable)',
      collect,
    )
    .option(
      '--trace <depth>',
      'run with set trace on at this depth',
      nonNegativeInt('--trace'),
    )
    .option('--parallel', 'run several scripts concurrently')
    .option(
      '-j, --jobs <n>',
      'parallel workers (default: CPU count)',
      positiveInt('--jobs'),
    )
    .option('--keep-log', 'keep the log of inline code');
  addExecOptions(sub);
  sub.action(
    guard((_s: string[], flags: RunFlags) => formatOf(flags), runAction),
  );
  return cli;
};
