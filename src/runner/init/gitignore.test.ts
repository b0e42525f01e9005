import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ensureProjectGitignore } from '@/runner/init/gitignore';

const readUtf8 = (p: string) => readFile(p, 'utf8');

describe('ensureProjectGitignore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'strepro-gitignore-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends log and temp do-file patterns after existing content', async () => {
    const giPath = path.join(dir, '.gitignore');
    await writeFile(giPath, 'data/raw', 'utf8');

    const added = await ensureProjectGitignore(dir, 'logs\\');

    expect(added).toEqual(['*.log', '_strepro_inline_*.do', '*_strepro_trace_*.do', 'logs/']);
    expect(await readUtf8(giPath)).toBe(
      'data/raw\n*.log\n_strepro_inline_*.do\n*_strepro_trace_*.do\nlogs/\n',
    );
  });

  it('is idempotent (does not duplicate lines on a subsequent run)', async () => {
    const giPath = path.join(dir, '.gitignore');

    await ensureProjectGitignore(dir);
    const first = await readUtf8(giPath);
    const again = await ensureProjectGitignore(dir);

    expect(again).toEqual([]);
    expect(await readUtf8(giPath)).toBe(first);
  });
});
