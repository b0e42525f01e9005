import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '@/common/errors';

import {
  editManifestPackages,
  findProjectRoot,
  loadProject,
  parseManifest,
  requireProject,
} from './load';
import { loadUserConfig, userConfigPath } from './user';

describe('manifest loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-cfg-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds the nearest ancestor holding a manifest', async () => {
    await writeFile(path.join(dir, 'strepro.yml'), 'project:\n  name: demo\n', 'utf8');
    const nested = path.join(dir, 'code', 'clean');
    await mkdir(nested, { recursive: true });
    expect(findProjectRoot(nested)).toBe(dir);

    const project = await loadProject(nested);
    expect(project?.root).toBe(dir);
    expect(project?.manifest.project?.name).toBe('demo');
  });

  it('requires a project when asked to', async () => {
    await expect(requireProject(dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it('accepts every task shape and both package forms', () => {
    const m = parseManifest(
      'strepro.yml',
      [
        'run:',
        '  jobs: 2',
        '  allowGlobal: "true"',
        'packages:',
        '  dependencies:',
        '    reghdfe: ssc',
        '    ftools: { source: ssc, version: 20240115 }',
        '  dev:',
        '    mytool: github:someone/mytool@v1.2.0',
        'scripts:',
        '  tasks:',
        '    clean: code/clean.do',
        '    all: [clean, code/analysis.do]',
        '    figs: { parallel: [code/f1.do, code/f2.do] }',
        '    sim: { script: code/sim.do, args: { SEED: 42 } }',
        '',
      ].join('\n'),
    );
    expect(m.run).toEqual({ jobs: 2, allowGlobal: true });
    expect(m.packages?.dependencies?.ftools).toEqual({ source: 'ssc', version: '20240115' });
    expect(m.scripts?.tasks?.sim).toEqual({ script: 'code/sim.do', args: { SEED: '42' } });
  });

  it('lists every issue as a path: message line', () => {
    let caught: unknown;
    try {
      parseManifest(
        'strepro.yml',
        'run:\n  jobs: 0\npackages:\n  dependencies:\n    x: { source: ssc, version: ">>1" }\n',
      );
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const lines = caught instanceof Error ? caught.message.split('\n') : [];
    expect(lines[0]).toBe('strepro: invalid manifest strepro.yml');
    expect(lines.some((l) => l.startsWith('run.jobs: '))).toBe(true);
    expect(lines.some((l) => l.startsWith('packages.dependencies.x'))).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(() => parseManifest('strepro.yml', 'colour: blue\n')).toThrow(ConfigError);
  });

  it('edits package sections in YAML and keeps comments', async () => {
    const file = path.join(dir, 'strepro.yml');
    await writeFile(
      file,
      '# my study\npackages:\n  dependencies:\n    reghdfe: ssc\n',
      'utf8',
    );
    const { manifest, missing } = await editManifestPackages(file, [
      { op: 'set', group: 'dev', name: 'reghdfe', spec: 'ssc' },
      { op: 'set', group: 'production', name: 'estout', spec: 'ssc' },
      { op: 'remove', name: 'absent' },
    ]);
    expect(missing).toEqual(['absent']);
    expect(manifest.packages?.dev).toEqual({ reghdfe: 'ssc' });
    expect(manifest.packages?.dependencies).toEqual({ estout: 'ssc' });
    expect((await readFile(file, 'utf8')).startsWith('# my study\n')).toBe(true);
  });

  it('edits JSON manifests', async () => {
    const file = path.join(dir, 'strepro.json');
    await writeFile(file, '{"packages":{"test":{"assertx":"ssc"}}}', 'utf8');
    await editManifestPackages(file, [{ op: 'remove', name: 'assertx' }]);
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({ packages: { test: {} } });
  });

  it('does not write an edit that fails validation', async () => {
    const file = path.join(dir, 'strepro.yml');
    const before = 'packages:\n  dependencies: {}\n';
    await writeFile(file, before, 'utf8');
    await expect(
      editManifestPackages(file, [
        { op: 'set', group: 'production', name: 'x', spec: 'bogus:thing' },
      ]),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(await readFile(file, 'utf8')).toBe(before);
  });
});

describe('user config', () => {
  it('lives under XDG_CONFIG_HOME when set', () => {
    expect(userConfigPath({ XDG_CONFIG_HOME: '/x' }, '/home/u')).toBe(
      path.join('/x', 'strepro', 'config.yml'),
    );
    expect(userConfigPath({}, '/home/u')).toBe(
      path.join('/home/u', '.config', 'strepro', 'config.yml'),
    );
  });

  it('loads and validates settings', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'strepro-user-'));
    try {
      const file = path.join(dir, 'config.yml');
      expect(await loadUserConfig(file)).toEqual({});
      await writeFile(file, 'stataBinary: /opt/stata/stata-mp\n', 'utf8');
      expect(await loadUserConfig(file)).toEqual({ stataBinary: '/opt/stata/stata-mp' });
      await writeFile(file, 'stataBinary: 3\n', 'utf8');
      await expect(loadUserConfig(file)).rejects.toBeInstanceOf(ConfigError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
