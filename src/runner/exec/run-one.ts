/* src/runner/exec/run-one.ts
 * Single interpreter run: prepare the do-file, spawn in batch mode, wait,
 * then judge the log. The child's own exit status is never consulted.
 */
import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { rename } from 'node:fs/promises';
import path from 'node:path';

import { move, outputFile, pathExists, remove } from 'fs-extra';

import { EnvironmentError, FileError } from '@/common/errors';
import { type DetectionResult, detectFromLog } from '@/runner/errors/detect';
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_EXEC_CLEANUP } from '@/runner/util/debug-scopes';

import type { Engine } from './binary';
import { isolationEnv } from './isolation';
import { followLog } from './log-follow';
import { GROUP_SPAWN, ProcessSupervisor } from './supervisor';

export const ARG_ENV_PREFIX = 'STREPRO_ARG_';
export const BATCH_FLAGS = ['-b', '-q', 'do'] as const;

export type OutputMode = 'quiet' | 'default' | 'verbose' | 'profile';

export type RunRequest = Readonly<{
  /** Stable key for results (defaults to the script path). */
  id?: string;
  /** Do-file to run, relative to cwd or absolute. */
  script?: string;
  /** Inline code; written to a temporary do-file in cwd. */
  code?: string;
  cwd: string;
  /** Exposed to the script as STREPRO_ARG_<KEY>. */
  args?: Readonly<Record<string, string>>;
  /** `set tracedepth` for a traced run. */
  trace?: number;
  timeoutMs?: number;
  /** Keep the log of an inline run. */
  keepLog?: boolean;
  /** S_ADO entries; undefined leaves interpreter defaults. */
  adoPath?: readonly string[];
  /** Move the finished log here (relative to cwd or absolute). */
  logDir?: string;
}>;

export type RunContext = {
  engine: Engine;
  supervisor?: ProcessSupervisor;
  signal?: AbortSignal;
  output?: OutputMode;
  /** Receives log lines as they are written (verbose mode). */
  onLogLine?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
};

export type PhaseTimings = {
  prepareMs: number;
  executeMs: number;
  parseMs: number;
};

export type RunResult = DetectionResult & {
  id: string;
  script: string;
  timedOut?: boolean;
  phases: PhaseTimings;
};

const ARG_KEY_RE = /^\w+$/;

/** `STREPRO_ARG_<KEY>` entries for the child env. */
export const argEnv = (
  args: Readonly<Record<string, string>> | undefined,
): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(args ?? {})) {
    if (!ARG_KEY_RE.test(k))
      throw new EnvironmentError(
        `invalid argument name "${k}" (letters, digits, _)`,
      );
    out[`${ARG_ENV_PREFIX}${k.toUpperCase()}`] = v;
  }
  return out;
};

/** Parse `KEY=VALUE` pairs (--arg). */
export const parseArgPairs = (
  pairs: readonly string[],
): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const p of pairs) {
    const i = p.indexOf('=');
    if (i <= 0) throw new EnvironmentError(`--arg expects KEY=VALUE, got "${p}"`);
    out[p.slice(0, i)] = p.slice(i + 1);
  }
  return out;
};

/** Where the interpreter writes the log for a do-file: `<cwd>/<stem>.log`. */
export const logPathFor = (cwd: string, script: string): string =>
  path.join(cwd, `${path.basename(script, path.extname(script))}.log`);

const quoteDo = (p: string): string => `do "${p.replace(/\\/g, '/')}"`;

type Prepared = {
  /** File handed to the interpreter. */
  runFile: string;
  /** Where the user expects the log. */
  logPath: string;
  /** Display name. */
  script: string;
  temps: string[];
  /** Log of runFile when it differs from logPath. */
  movedLog?: string;
  dropLog: boolean;
};

const prepare = async (req: RunRequest): Promise<Prepared> => {
  const tag = randomUUID().slice(0, 8);
  const temps: string[] = [];
  let script: string;
  let target: string;
  let dropLog = false;

  if (req.code !== undefined) {
    target = path.join(req.cwd, `_strepro_inline_${tag}.do`);
    await outputFile(target, `${req.code}\n`, 'utf8');
    temps.push(target);
    script = '<inline>';
    dropLog = !req.keepLog;
  } else if (req.script) {
    target = path.resolve(req.cwd, req.script);
    if (!(await pathExists(target)))
      throw new FileError(`script not found: ${req.script}`, target);
    script = req.script;
  } else {
    throw new EnvironmentError('nothing to run: give a script or inline code');
  }

  const logPath = logPathFor(req.cwd, target);
  if (req.trace === undefined)
    return { runFile: target, logPath, script, temps, dropLog };

  const wrapper = path.join(
    req.cwd,
    `${path.basename(target, path.extname(target))}_strepro_trace_${tag}.do`,
  );
  await outputFile(
    wrapper,
    [
      'set trace on',
      `set tracedepth ${String(req.trace)}`,
      quoteDo(target),
      '',
    ].join('\n'),
    'utf8',
  );
  temps.push(wrapper);
  return {
    runFile: wrapper,
    logPath,
    script,
    temps,
    movedLog: logPathFor(req.cwd, wrapper),
    dropLog,
  };
};

const cleanup = async (prep: Prepared): Promise<void> => {
  const doomed = [...prep.temps, ...(prep.dropLog ? [prep.logPath] : [])];
  for (const f of doomed) {
    try {
      await remove(f);
    } catch (e) {
      debugFallback(DBG_SCOPE_EXEC_CLEANUP, `${f}: ${reasonOf(e)}`);
    }
  }
};

type Exit = { signal: NodeJS.Signals | null; timedOut: boolean };

const spawnAndWait = (
  req: RunRequest,
  ctx: RunContext,
  runFile: string,
  supervisor: ProcessSupervisor,
  key: string,
): Promise<Exit> =>
  new Promise<Exit>((resolveP, rejectP) => {
    const argv = [...ctx.engine.args, ...BATCH_FLAGS, runFile];
    const child = spawn(ctx.engine.command, argv, {
      cwd: req.cwd,
      stdio: 'ignore',
      detached: GROUP_SPAWN,
      windowsHide: true,
      env: {
        ...(ctx.env ?? process.env),
        ...isolationEnv(req.adoPath),
        ...argEnv(req.args),
      },
    });
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const pid = child.pid;

    const onAbort = (): void => {
      if (typeof pid === 'number') void supervisor.terminate(pid);
    };
    if (typeof pid === 'number') {
      supervisor.track(key, pid);
      ctx.signal?.addEventListener('abort', onAbort, { once: true });
      if (ctx.signal?.aborted) onAbort();
      if (req.timeoutMs !== undefined && req.timeoutMs > 0)
        timer = setTimeout(() => {
          timedOut = true;
          onAbort();
        }, req.timeoutMs);
    }

    const done = (): void => {
      if (timer) clearTimeout(timer);
      ctx.signal?.removeEventListener('abort', onAbort);
      supervisor.untrack(key);
    };
    child.on('error', (e) => {
      done();
      rejectP(
        new EnvironmentError(
          `failed to start ${ctx.engine.command}: ${e.message}`,
          { cause: e },
        ),
      );
    });
    child.on('close', (_code, signal) => {
      done();
      resolveP({ signal, timedOut });
    });
  });

/** Move the log into req.logDir when asked; returns where the log now lives. */
const archiveLog = async (req: RunRequest, prep: Prepared): Promise<string> => {
  if (!req.logDir || prep.dropLog || !(await pathExists(prep.logPath)))
    return prep.logPath;
  const dest = path.join(
    path.resolve(req.cwd, req.logDir),
    path.basename(prep.logPath),
  );
  await move(prep.logPath, dest, { overwrite: true });
  return dest;
};

/** Run one do-file (or inline snippet) and return its verdict. */
export const runOne = async (
  req: RunRequest,
  ctx: RunContext,
): Promise<RunResult> => {
  const t0 = performance.now();
  const prep = await prepare(req);
  const id = req.id ?? prep.script;
  const supervisor = ctx.supervisor ?? new ProcessSupervisor();

  try {
    // A stale log from an earlier run must not be mistaken for this one.
    await remove(prep.logPath);
    if (prep.movedLog) await remove(prep.movedLog);
    const follower =
      ctx.output === 'verbose' && ctx.onLogLine
        ? followLog(prep.movedLog ?? prep.logPath, ctx.onLogLine)
        : undefined;

    const t1 = performance.now();
    let exit: Exit;
    try {
      exit = await spawnAndWait(
        req,
        ctx,
        prep.runFile,
        supervisor,
        `${id}:${randomUUID()}`,
      );
    } finally {
      await follower?.stop();
    }
    const t2 = performance.now();

    if (prep.movedLog && (await pathExists(prep.movedLog)))
      await rename(prep.movedLog, prep.logPath);
    const result = await detectFromLog({
      logPath: prep.logPath,
      durationMs: t2 - t1,
      signal: exit.signal,
    });
    const t3 = performance.now();
    const logPath = await archiveLog(req, prep);
    return {
      ...result,
      logPath,
      id,
      script: prep.script,
      ...(exit.timedOut ? { timedOut: true } : {}),
      phases: { prepareMs: t1 - t0, executeMs: t2 - t1, parseMs: t3 - t2 },
    };
  } finally {
    await cleanup(prep);
  }
};
