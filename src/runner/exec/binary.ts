/* src/runner/exec/binary.ts
 * Interpreter binary detection.
 * Order: --engine, $STATA_BINARY, user config, install locations, PATH.
 */
import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

import { EnvironmentError } from '@/common/errors';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_BINARY_DETECT } from '@/runner/util/debug-scopes';

import locations from './install-locations.json';

export const BINARY_NAMES = ['stata-mp', 'stata-se', 'stata-be', 'stata'] as const;

/** How the child is started: `<command> <args...> -b -q do <script>`. */
export type Engine = Readonly<{ command: string; args: readonly string[] }>;

export type BinarySource = 'flag' | 'env' | 'config' | 'install' | 'path';

export type DetectedBinary = { path: string; source: BinarySource };

export type DetectOptions = {
  /** --engine */
  explicit?: string;
  /** stataBinary from the user config. */
  configured?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** Install locations to try; defaults to the table for the platform. */
  installLocations?: readonly string[];
};

const isExecutable = (p: string, platform: NodeJS.Platform): boolean => {
  try {
    if (!statSync(p).isFile()) return false;
    if (platform !== 'win32') accessSync(p, constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/** First PATH entry holding an executable `name` (PATHEXT applied on Windows). */
export const findInPath = (
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string | undefined => {
  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
  const exts =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
      : [''];
  for (const dir of dirs)
    for (const ext of exts) {
      const candidate = path.join(dir, `${name}${ext}`);
      if (isExecutable(candidate, platform)) return candidate;
    }
  return undefined;
};

/** A configured binary: a path must exist; a bare name must be on PATH. */
const verify = (
  raw: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
): string | undefined => {
  if (raw.includes('/') || raw.includes('\\'))
    return isExecutable(raw, platform) ? raw : undefined;
  return findInPath(raw, env, platform);
};

const platformLocations = (platform: NodeJS.Platform): readonly string[] => {
  switch (platform) {
    case 'darwin':
      return locations.darwin;
    case 'win32':
      return locations.win32;
    case 'linux':
      return locations.linux;
    default:
      return [];
  }
};

export const detectBinary = (opts: DetectOptions = {}): DetectedBinary => {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? process.platform;

  const pinned: Array<[BinarySource, string | undefined, string]> = [
    ['flag', opts.explicit, '--engine'],
    ['env', env.STATA_BINARY, '$STATA_BINARY'],
    ['config', opts.configured, 'stataBinary in the user config'],
  ];
  for (const [source, raw, label] of pinned) {
    if (!raw?.trim()) continue;
    const found = verify(raw.trim(), env, platform);
    if (!found)
      throw new EnvironmentError(
        `interpreter from ${label} not found or not executable: ${raw}`,
      );
    return { path: found, source };
  }

  for (const p of opts.installLocations ?? platformLocations(platform)) {
    if (isExecutable(p, platform)) return { path: p, source: 'install' };
  }
  debugFallback(DBG_SCOPE_BINARY_DETECT, 'no install location matched; searching PATH');

  for (const name of BINARY_NAMES) {
    const found = findInPath(name, env, platform);
    if (found) return { path: found, source: 'path' };
  }
  throw new EnvironmentError(
    [
      'no Stata binary found. Tried:',
      '  --engine, $STATA_BINARY, stataBinary in ~/.config/strepro/config.yml,',
      `  standard install locations, and PATH (${BINARY_NAMES.join(', ')}).`,
    ].join('\n'),
  );
};

export const engineOf = (binary: string): Engine =>
  Object.freeze({ command: binary, args: Object.freeze([]) });
