/* src/cli/testing.ts
 * `strepro test [filters...]`: discover test do-files and run them.
 */
import type { Command } from 'commander';

import {
  assertScriptsExist,
  runParallel,
  runSequential,
} from '@/runner/exec/orchestrator';
import { parseArgPairs, type RunRequest, type RunResult } from '@/runner/exec/run-one';
import type { DependencyGroup } from '@/runner/packages/types';
import { discoverTests } from '@/runner/testing/discover';

import { collect, positiveInt } from './cli-utils';
import { emitJson, formatOf, guard, say } from './output';
import { outputModeOf, printRunLine, reportBatch } from './report';
import { addExecOptions, type RunFlags } from './run';
import {
  engineFor,
  isolationFor,
  jobsFor,
  openProject,
  runDirs,
  timeoutFor,
  withCancellation,
} from './session';

/** Tests see production and test packages unless --group says otherwise. */
const TEST_GROUPS: DependencyGroup[] = ['production', 'test'];

export type TestFlags = Omit<RunFlags, 'code' | 'keepLog' | 'trace'>;

export const testAction = async (filters: string[], flags: TestFlags): Promise<void> => {
  const format = formatOf(flags);
  const mode = format === 'json' ? 'quiet' : outputModeOf(flags);
  const ws = await openProject();
  const root = ws.project.root;
  const tests = await discoverTests(root, filters);
  if (!tests.length) {
    if (format === 'json')
      emitJson({ success: true, exitCode: 0, tests: 0, results: [] });
    else say(`no tests found${filters.length ? ` matching ${filters.join(', ')}` : ''}`);
    return;
  }

  const engine = engineFor(ws, flags);
  const adoPath = await isolationFor(ws, { ...flags, group: flags.group ?? TEST_GROUPS });
  const timeoutMs = timeoutFor(ws, flags.timeout);
  const args = parseArgPairs(flags.arg ?? []);
  const requests: RunRequest[] = tests.map((t) => ({
    ...runDirs(ws),
    id: t.path,
    script: t.path,
    cwd: root,
    ...(Object.keys(args).length ? { args } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(adoPath ? { adoPath } : {}),
  }));
  await assertScriptsExist(requests);

  const out = await withCancellation({ engine, output: 'quiet' }, (ctx) => {
    const onResult = (r: RunResult): void => {
      printRunLine(r, mode);
    };
    return flags.parallel
      ? runParallel(requests, ctx, jobsFor(ws, flags.jobs), onResult)
      : runSequential(requests, ctx, onResult);
  });
  reportBatch(out, mode, format, { tests: tests.length });
};

export const registerTest = (cli: Command): Command => {
  const sub = cli
    .command('test')
    .description('discover test do-files (test_*.do, *_test.do, test/, tests/) and run them')
    .argument('[filters...]', 'only tests whose name or path contains one of these')
    .option(
      '--arg <KEY=VALUE>',
      'pass STREPRO_ARG_<KEY> to every test (repeatable)',
      collect,
    )
    .option('--parallel', 'run tests concurrently')
    .option(
      '-j, --jobs <n>',
      'parallel workers (default: CPU count)',
      positiveInt('--jobs'),
    );
  addExecOptions(sub);
  sub.action(
    guard((_f: string[], flags: TestFlags) => formatOf(flags), testAction),
  );
  return cli;
};
