/* src/runner/tasks/plan.ts
 * Expand a named task into a tree of run requests.
 */
import { ConfigError } from '@/common/errors';
import type { RunRequest } from '@/runner/exec/run-one';

import {
  didYouMean,
  hasTask,
  isRefList,
  isScriptRef,
  type TaskDef,
  type TaskTable,
  validateTasks,
} from './graph';

export type TaskPlan =
  | { kind: 'script'; task: string; request: RunRequest }
  | { kind: 'sequence'; task: string; steps: TaskPlan[] }
  | { kind: 'parallel'; task: string; steps: TaskPlan[] };

export type PlanOptions = {
  /** Project root; scripts resolve against it and run there. */
  root: string;
  /** Fields shared by every request (isolation path, timeout, log dir). */
  base?: Omit<RunRequest, 'id' | 'script' | 'code' | 'cwd' | 'args'>;
  /** Extra arguments given on the command line; they win over task args. */
  args?: Readonly<Record<string, string>>;
  configPath?: string;
};

/**
 * Plan `name`. The table is validated first, so unknown references and
 * cycles surface before anything runs.
 */
export const planTask = (tasks: TaskTable, name: string, opts: PlanOptions): TaskPlan => {
  validateTasks(tasks, opts.configPath);
  const root = hasTask(tasks, name) ? tasks[name] : undefined;
  if (root === undefined)
    throw new ConfigError(
      `strepro: unknown task "${name}"${didYouMean(name, Object.keys(tasks))}`,
      opts.configPath ?? 'strepro.yml',
    );

  const scriptStep = (
    task: string,
    script: string,
    args?: Readonly<Record<string, string>>,
  ): TaskPlan => {
    const merged = { ...args, ...opts.args };
    return {
      kind: 'script',
      task,
      request: {
        ...opts.base,
        id: task,
        script,
        cwd: opts.root,
        ...(Object.keys(merged).length ? { args: merged } : {}),
      },
    };
  };

  const expandRef = (ref: string): TaskPlan => {
    const def = hasTask(tasks, ref) ? tasks[ref] : undefined;
    return isScriptRef(ref) || def === undefined ? scriptStep(ref, ref) : expand(ref, def);
  };

  const expand = (task: string, def: TaskDef): TaskPlan => {
    if (typeof def === 'string') return scriptStep(task, def);
    if (isRefList(def)) return { kind: 'sequence', task, steps: def.map(expandRef) };
    if ('parallel' in def)
      return { kind: 'parallel', task, steps: def.parallel.map(expandRef) };
    return scriptStep(task, def.script, def.args);
  };

  return expand(name, root);
};

/** Requests in plan order (for skipped lists and dry runs). */
export const planRequests = (plan: TaskPlan): RunRequest[] =>
  plan.kind === 'script' ? [plan.request] : plan.steps.flatMap(planRequests);
