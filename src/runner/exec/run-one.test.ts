import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EnvironmentError, FileError } from '@/common/errors';
import { fakeEngine } from '@/test/fake-engine';

import { argEnv, parseArgPairs, runOne } from './run-one';

describe('runOne', () => {
  let dir: string;
  const write = (name: string, body: string): Promise<void> =>
    writeFile(path.join(dir, name), body, 'utf8');
  const ctx = { engine: fakeEngine };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-run-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports success from the log', async () => {
    await write('ok.do', 'display "hello"\n');
    const r = await runOne({ script: 'ok.do', cwd: dir }, ctx);
    expect(r).toMatchObject({
      id: 'ok.do',
      script: 'ok.do',
      success: true,
      exitCode: 0,
      logPath: path.join(dir, 'ok.log'),
    });
    expect(r.errors).toEqual([]);
    expect(await readFile(r.logPath, 'utf8')).toContain('hello\n');
  });

  it('maps the trailing status code to its exit class', async () => {
    await write('missing.do', 'display "start"\nerror 601\ndisplay "never"\n');
    const r = await runOne({ script: 'missing.do', cwd: dir }, ctx);
    expect(r.success).toBe(false);
    expect(r.exitCode).toBe(3);
    expect(r.errors[0]).toMatchObject({
      code: 601,
      name: 'file-not-found',
      message: 'fake failure 601',
    });
  });

  it('treats a log without the completion marker as incomplete', async () => {
    await write('crash.do', 'display "x"\nabort\n');
    const r = await runOne({ script: 'crash.do', cwd: dir }, ctx);
    expect(r).toMatchObject({ success: false, exitCode: 5, incomplete: true });
  });

  it('never judges a stale log from an earlier run', async () => {
    await write('crash.log', 'end of do-file\n');
    await write('crash.do', 'abort\n');
    const r = await runOne({ script: 'crash.do', cwd: dir }, ctx);
    expect(r.incomplete).toBe(true);
  });

  it('passes arguments and the isolation path through the environment', async () => {
    await write('env.do', 'display env STREPRO_ARG_NAME\ndisplay env S_ADO\n');
    const r = await runOne(
      {
        script: 'env.do',
        cwd: dir,
        args: { name: 'world' },
        adoPath: ['/cache/a/1', 'BASE'],
      },
      ctx,
    );
    const log = (await readFile(r.logPath, 'utf8')).split('\n');
    expect(log).toContain('world');
    expect(log).toContain('/cache/a/1;BASE');
  });

  it('moves the finished log into the log directory', async () => {
    await write('ok.do', 'display "hello"\n');
    const r = await runOne({ script: 'ok.do', cwd: dir, logDir: 'logs' }, ctx);
    expect(r.success).toBe(true);
    expect(r.logPath).toBe(path.join(dir, 'logs', 'ok.log'));
    expect(await readdir(path.join(dir, 'logs'))).toEqual(['ok.log']);
    expect((await readdir(dir)).includes('ok.log')).toBe(false);
  });

  it('runs inline code and cleans up after itself', async () => {
    const r = await runOne({ code: 'display "inline"', cwd: dir }, ctx);
    expect(r.success).toBe(true);
    expect(r.script).toBe('<inline>');
    expect(await readdir(dir)).toEqual([]);
  });

  it('keeps the inline log on request', async () => {
    const r = await runOne({ code: 'display "inline"', cwd: dir, keepLog: true }, ctx);
    const files = await readdir(dir);
    expect(files).toEqual([path.basename(r.logPath)]);
  });

  it('wraps a traced run and reports the script log', async () => {
    await write('t.do', 'display "traced"\n');
    const r = await runOne({ script: 't.do', cwd: dir, trace: 2 }, ctx);
    expect(r.success).toBe(true);
    expect(r.logPath).toBe(path.join(dir, 't.log'));
    const log = await readFile(r.logPath, 'utf8');
    expect(log.startsWith('. set trace on\n. set tracedepth 2\n')).toBe(true);
    expect((await readdir(dir)).sort()).toEqual(['t.do', 't.log']);
  });

  it('terminates a run that exceeds its timeout', async () => {
    await write('slow.do', 'hang\n');
    const r = await runOne({ script: 'slow.do', cwd: dir, timeoutMs: 300 }, ctx);
    expect(r).toMatchObject({
      success: false,
      signal: 'SIGTERM',
      exitCode: 143,
      timedOut: true,
    });
  });

  it('streams log lines in verbose mode', async () => {
    await write('v.do', 'display "one"\nsleep 150\ndisplay "two"\n');
    const lines: string[] = [];
    await runOne(
      { script: 'v.do', cwd: dir },
      { ...ctx, output: 'verbose', onLogLine: (l) => lines.push(l) },
    );
    expect(lines).toEqual([
      '. display "one"',
      'one',
      '. sleep 150',
      '. display "two"',
      'two',
      '',
      'end of do-file',
    ]);
  });

  it('rejects a missing script', async () => {
    await expect(runOne({ script: 'nope.do', cwd: dir }, ctx)).rejects.toBeInstanceOf(
      FileError,
    );
  });

  it('reports an interpreter that cannot start', async () => {
    await write('ok.do', 'display 1\n');
    await expect(
      runOne(
        { script: 'ok.do', cwd: dir },
        { engine: { command: path.join(dir, 'no-such-binary'), args: [] } },
      ),
    ).rejects.toBeInstanceOf(EnvironmentError);
  });
});

describe('script arguments', () => {
  it('upper-cases keys under the argument prefix', () => {
    expect(argEnv({ year: '2024', Region: 'west' })).toEqual({
      STREPRO_ARG_YEAR: '2024',
      STREPRO_ARG_REGION: 'west',
    });
  });

  it('parses KEY=VALUE pairs, keeping later equals signs', () => {
    expect(parseArgPairs(['a=1', 'expr=x=y'])).toEqual({ a: '1', expr: 'x=y' });
    expect(() => parseArgPairs(['=1'])).toThrow(EnvironmentError);
  });
});
