/* src/cli/task.ts
 * `strepro task list` and `strepro task run <name>`.
 */
import type { Command } from 'commander';

import { assertScriptsExist } from '@/runner/exec/orchestrator';
import { parseArgPairs, type RunResult } from '@/runner/exec/run-one';
import {
  listTasks,
  planRequests,
  planTask,
  runTask,
  validateTasks,
} from '@/runner/tasks';

import { collect, positiveInt } from './cli-utils';
import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  renderTable,
  say,
} from './output';
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

export type TaskRunFlags = Omit<RunFlags, 'code' | 'keepLog' | 'trace' | 'parallel'>;

export const taskListAction = async (flags: FormatFlags): Promise<void> => {
  const ws = await openProject();
  const tasks = ws.project.manifest.scripts?.tasks ?? {};
  validateTasks(tasks, ws.project.manifestPath);
  const rows = listTasks(tasks);
  if (formatOf(flags) === 'json') {
    emitJson({ tasks: rows });
    return;
  }
  if (!rows.length) {
    say(`no tasks in ${ws.project.manifestPath}`);
    return;
  }
  console.log(
    renderTable(
      ['Task', 'Description'],
      rows.map((r) => [r.name, r.description]),
    ),
  );
};

export const taskRunAction = async (name: string, flags: TaskRunFlags): Promise<void> => {
  const format = formatOf(flags);
  const mode = format === 'json' ? 'quiet' : outputModeOf(flags);
  const ws = await openProject();
  const { root, manifest, manifestPath } = ws.project;
  const adoPath = await isolationFor(ws, flags);
  const timeoutMs = timeoutFor(ws, flags.timeout);
  const { logDir } = runDirs(ws);
  const plan = planTask(manifest.scripts?.tasks ?? {}, name, {
    root,
    configPath: manifestPath,
    args: parseArgPairs(flags.arg ?? []),
    base: {
      ...(logDir ? { logDir } : {}),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(adoPath ? { adoPath } : {}),
    },
  });
  await assertScriptsExist(planRequests(plan));
  const engine = engineFor(ws, flags);

  const out = await withCancellation({ engine, output: 'quiet' }, (ctx) => {
    const jobs = jobsFor(ws, flags.jobs);
    return runTask(plan, ctx, {
      ...(jobs !== undefined ? { jobs } : {}),
      onResult: (r: RunResult) => {
        printRunLine(r, mode);
      },
    });
  });
  reportBatch(out, mode, format, { task: out.task });
};

export const registerTask = (cli: Command): Command => {
  const task = cli.command('task').description('named tasks from the manifest');

  addFormatOptions(
    task.command('list').description('list tasks and their descriptions'),
  ).action(guard((flags: FormatFlags) => formatOf(flags), taskListAction));

  const run = task
    .command('run')
    .description('run a task (sequences stop at the first failure)')
    .argument('<name>', 'task name')
    .option(
      '--arg <KEY=VALUE>',
      'pass STREPRO_ARG_<KEY> to every script (repeatable)',
      collect,
    )
    .option(
      '-j, --jobs <n>',
      'interpreters at once in parallel groups',
      positiveInt('--jobs'),
    );
  addExecOptions(run);
  run.action(
    guard((_n: string, flags: TaskRunFlags) => formatOf(flags), taskRunAction),
  );
  return cli;
};
