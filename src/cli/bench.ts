/* src/cli/bench.ts
 * `strepro bench <script>`: warmups, then measured runs with timing stats.
 */
import type { Command } from 'commander';

import {
  assertScriptsExist,
  DEFAULT_RUNS,
  DEFAULT_WARMUP,
  runBench,
} from '@/runner/exec/orchestrator';
import { parseArgPairs, type RunRequest } from '@/runner/exec/run-one';
import { dim } from '@/runner/util/color';

import { collect, nonNegativeInt, positiveInt } from './cli-utils';
import { formatOf, guard, resultLine } from './output';
import { outputModeOf, reportBench } from './report';
import { addExecOptions, type RunFlags } from './run';
import {
  engineFor,
  isolationFor,
  openWorkspace,
  runDirs,
  timeoutFor,
  withCancellation,
} from './session';

export type BenchFlags = Omit<
  RunFlags,
  'code' | 'parallel' | 'jobs' | 'keepLog' | 'trace'
> & {
  runs?: number;
  warmup?: number;
};

export const benchAction = async (script: string, flags: BenchFlags): Promise<void> => {
  const format = formatOf(flags);
  const mode = format === 'json' ? 'quiet' : outputModeOf(flags);
  const ws = await openWorkspace();
  const engine = engineFor(ws, flags);
  const adoPath = await isolationFor(ws, flags);
  const timeoutMs = timeoutFor(ws, flags.timeout);
  const args = parseArgPairs(flags.arg ?? []);
  const req: RunRequest = {
    ...runDirs(ws),
    script,
    ...(Object.keys(args).length ? { args } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(adoPath ? { adoPath } : {}),
  };
  await assertScriptsExist([req]);

  const out = await withCancellation({ engine, output: 'quiet' }, (ctx) =>
    runBench(
      req,
      ctx,
      { runs: flags.runs ?? DEFAULT_RUNS, warmup: flags.warmup ?? DEFAULT_WARMUP },
      (r, phase, i) => {
        if (mode === 'quiet') return;
        if (mode === 'default' && r.success) return;
        console.log(dim(resultLine(`${phase} ${String(i + 1)}`, r)));
      },
    ),
  );
  reportBench(script, out, format);
};

export const registerBench = (cli: Command): Command => {
  const sub = cli
    .command('bench')
    .description('benchmark a do-file: warmup runs, then timed runs')
    .argument('<script>', 'do-file to benchmark')
    .option(
      '-n, --runs <n>',
      `measured runs (default ${String(DEFAULT_RUNS)})`,
      positiveInt('--runs'),
    )
    .option(
      '-w, --warmup <n>',
      `discarded warmup runs (default ${String(DEFAULT_WARMUP)})`,
      nonNegativeInt('--warmup'),
    )
    .option(
      '--arg <KEY=VALUE>',
      'pass STREPRO_ARG_<KEY> to the script (repeatable)',
      collect,
    );
  addExecOptions(sub);
  sub.action(
    guard((_s: string, flags: BenchFlags) => formatOf(flags), benchAction),
  );
  return cli;
};
