/* src/runner/tasks/graph.ts
 * Task table validation: reference resolution, suggestions, cycle detection.
 */
import { ConfigError } from '@/common/errors';

/** One manifest task (mirrors the manifest schema's task union). */
export type TaskDef =
  | string
  | readonly string[]
  | Readonly<{ parallel: readonly string[]; description?: string }>
  | Readonly<{
      script: string;
      args?: Readonly<Record<string, string>>;
      description?: string;
    }>;

export type TaskTable = Readonly<Record<string, TaskDef>>;

export type TaskRow = { name: string; description: string };

const SUGGEST_DISTANCE = 3;
const SUGGEST_MAX = 3;

/** A reference that names a do-file rather than a task. */
export const isScriptRef = (ref: string): boolean =>
  /\.do$/i.test(ref) || ref.includes('/') || ref.includes('\\');

export const levenshtein = (a: string, b: string): number => {
  if (!a.length) return b.length;
  if (!b.length) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i += 1) {
    const row = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (row[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost,
      );
    }
    prev = row;
  }
  return prev[b.length] ?? 0;
};

/** Closest known names (edit distance or containment), at most three. */
export const suggestNames = (name: string, known: Iterable<string>): string[] => {
  const needle = name.toLowerCase();
  return [...known]
    .map((k) => ({ k, d: levenshtein(k.toLowerCase(), needle) }))
    .filter(
      ({ k, d }) =>
        d <= SUGGEST_DISTANCE ||
        k.toLowerCase().includes(needle) ||
        needle.includes(k.toLowerCase()),
    )
    .sort((x, y) => x.d - y.d || x.k.localeCompare(y.k))
    .slice(0, SUGGEST_MAX)
    .map(({ k }) => k);
};

export const didYouMean = (name: string, known: Iterable<string>): string => {
  const hits = suggestNames(name, known);
  return hits.length ? ` (did you mean ${hits.map((h) => `"${h}"`).join(', ')}?)` : '';
};

export const hasTask = (tasks: TaskTable, name: string): boolean =>
  Object.hasOwn(tasks, name);

/** Every reference a task makes, scripts included. */
export const taskRefs = (def: TaskDef): readonly string[] => {
  if (typeof def === 'string') return [];
  if (isRefList(def)) return def;
  return 'parallel' in def ? def.parallel : [];
};

export const isRefList = (def: TaskDef): def is readonly string[] => Array.isArray(def);

const taskNameRefs = (def: TaskDef): string[] =>
  taskRefs(def).filter((r) => !isScriptRef(r));

export const describeTask = (def: TaskDef): string => {
  if (typeof def === 'string') return `run ${def}`;
  if (isRefList(def)) return `run ${String(def.length)} steps in order`;
  if (def.description) return def.description;
  return 'parallel' in def
    ? `run ${String(def.parallel.length)} steps in parallel`
    : `run ${def.script}`;
};

export const listTasks = (tasks: TaskTable): TaskRow[] =>
  Object.keys(tasks)
    .sort()
    .flatMap((name) => {
      const def = tasks[name];
      return def === undefined ? [] : [{ name, description: describeTask(def) }];
    });

/** First cycle found by DFS in name order, as `a -> b -> a`; undefined when acyclic. */
export const findTaskCycle = (tasks: TaskTable): string[] | undefined => {
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (name: string): string[] | undefined => {
    done.add(name);
    stack.push(name);
    onStack.add(name);
    const def = tasks[name];
    for (const ref of def === undefined ? [] : taskNameRefs(def)) {
      if (onStack.has(ref)) return [...stack.slice(stack.indexOf(ref)), ref];
      if (!done.has(ref)) {
        const found = visit(ref);
        if (found) return found;
      }
    }
    stack.pop();
    onStack.delete(name);
    return undefined;
  };

  for (const name of Object.keys(tasks).sort()) {
    if (done.has(name)) continue;
    const found = visit(name);
    if (found) return found;
  }
  return undefined;
};

/** Throw ConfigError for unknown task references or a reference cycle. */
export const validateTasks = (tasks: TaskTable, configPath = 'strepro.yml'): void => {
  const names = Object.keys(tasks);
  for (const name of names.sort()) {
    const def = tasks[name];
    for (const ref of def === undefined ? [] : taskNameRefs(def)) {
      if (!hasTask(tasks, ref))
        throw new ConfigError(
          `strepro: task "${name}" references unknown task "${ref}"${didYouMean(ref, names)}`,
          configPath,
        );
    }
  }
  const cycle = findTaskCycle(tasks);
  if (cycle)
    throw new ConfigError(
      `strepro: circular task reference: ${cycle.join(' -> ')}`,
      configPath,
    );
};
