/* src/cli/config/load.ts
 * Find, load and validate the project manifest (strepro.yml|yaml|json).
 */
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { ConfigError } from '@/common/errors';
import { editText, parseText } from '@/common/config/parse';
import { GROUP_SECTION, type PackageSpec } from '@/runner/packages/spec';
import type { DependencyGroup } from '@/runner/packages/types';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_MANIFEST_LOAD } from '@/runner/util/debug-scopes';

import { type Manifest, manifestSchema } from './schema';

export const MANIFEST_NAMES = ['strepro.yml', 'strepro.yaml', 'strepro.json'] as const;

export type Project = {
  root: string;
  manifestPath: string;
  manifest: Manifest;
};

export const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('\n')
    : String(e);

/** Manifest file in `dir`, if any. */
export const manifestIn = (dir: string): string | undefined =>
  MANIFEST_NAMES.map((n) => path.join(dir, n)).find((p) => existsSync(p));

/** Nearest ancestor of `start` (inclusive) holding a manifest. */
export const findProjectRoot = (start: string): string | undefined => {
  let dir = path.resolve(start);
  for (;;) {
    if (manifestIn(dir)) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
};

/** Parse and validate manifest text; ConfigError lists every issue. */
export const parseManifest = (file: string, text: string): Manifest => {
  const rel = file.replace(/\\/g, '/');
  let raw: unknown;
  try {
    raw = parseText(file, text);
  } catch (e) {
    throw new ConfigError(
      `strepro: cannot parse ${rel}: ${e instanceof Error ? e.message : String(e)}`,
      file,
      { cause: e },
    );
  }
  const parsed = manifestSchema.safeParse(raw ?? {});
  if (!parsed.success)
    throw new ConfigError(
      `strepro: invalid manifest ${rel}\n${formatZodError(parsed.error)}`,
      file,
    );
  return parsed.data;
};

export const loadManifest = async (file: string): Promise<Manifest> =>
  parseManifest(file, await readFile(file, 'utf8'));

/** The project around `cwd`, or undefined outside any project. */
export const loadProject = async (cwd: string): Promise<Project | undefined> => {
  const root = findProjectRoot(cwd);
  const manifestPath = root ? manifestIn(root) : undefined;
  if (!root || !manifestPath) {
    debugFallback(DBG_SCOPE_MANIFEST_LOAD, `no manifest above ${cwd}`);
    return undefined;
  }
  return { root, manifestPath, manifest: await loadManifest(manifestPath) };
};

export const noProjectError = (cwd: string): ConfigError =>
  new ConfigError(
    `strepro: no ${MANIFEST_NAMES.join(', ')} found in ${cwd} or its parents (run "strepro init")`,
    path.join(cwd, MANIFEST_NAMES[0]),
  );

export const requireProject = async (cwd: string): Promise<Project> => {
  const project = await loadProject(cwd);
  if (!project) throw noProjectError(cwd);
  return project;
};

export type PackageEdit =
  | { op: 'set'; group: DependencyGroup; name: string; spec: PackageSpec }
  | { op: 'remove'; name: string };

/**
 * Apply package edits to the manifest file in place and return the reloaded
 * manifest. `set` moves a package out of any other section; `remove` deletes
 * it from every section. Returns the names that were not declared anywhere
 * for removals.
 */
export const editManifestPackages = async (
  file: string,
  edits: readonly PackageEdit[],
): Promise<{ manifest: Manifest; missing: string[] }> => {
  const text = await readFile(file, 'utf8');
  const missing: string[] = [];
  const sections = Object.values(GROUP_SECTION);
  const next = editText(file, text, (doc) => {
    for (const e of edits) {
      const name = e.name.toLowerCase();
      const removed = sections
        .map((s) => doc.deleteIn(['packages', s, name]))
        .some(Boolean);
      if (e.op === 'set') doc.setIn(['packages', GROUP_SECTION[e.group], name], e.spec);
      else if (!removed) missing.push(name);
    }
  });
  // Validate before writing so a bad edit never lands on disk.
  const manifest = parseManifest(file, next);
  await writeFile(file, next, 'utf8');
  return { manifest, missing };
};

/** Minimal manifest for `strepro init`; JSON when `file` ends in .json. */
export const manifestTemplate = (name: string, file: string = MANIFEST_NAMES[0]): string =>
  file.endsWith('.json')
    ? `${JSON.stringify(
        { project: { name }, packages: { dependencies: {} }, scripts: { tasks: {} } },
        null,
        2,
      )}\n`
    : [
        'project:',
        `  name: ${JSON.stringify(name)}`,
        '',
        'packages:',
        '  dependencies: {}',
        '',
        'scripts:',
        '  tasks: {}',
        '',
      ].join('\n');
