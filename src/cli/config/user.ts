/* src/cli/config/user.ts
 * Per-user settings (~/.config/strepro/config.yml).
 */
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { pathExists } from 'fs-extra';

import { ConfigError } from '@/common/errors';
import { parseText } from '@/common/config/parse';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_USER_CONFIG } from '@/runner/util/debug-scopes';

import { formatZodError } from './load';
import { type UserConfig, userConfigSchema } from './schema';

export const userConfigPath = (
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string =>
  path.join(env.XDG_CONFIG_HOME ?? path.join(home, '.config'), 'strepro', 'config.yml');

/** Load the user config; absent file yields `{}`. */
export const loadUserConfig = async (
  file: string = userConfigPath(),
): Promise<UserConfig> => {
  if (!(await pathExists(file))) {
    debugFallback(DBG_SCOPE_USER_CONFIG, `no user config at ${file}`);
    return {};
  }
  let raw: unknown;
  try {
    raw = parseText(file, await readFile(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(
      `strepro: cannot parse ${file}: ${e instanceof Error ? e.message : String(e)}`,
      file,
      { cause: e },
    );
  }
  const parsed = userConfigSchema.safeParse(raw ?? {});
  if (!parsed.success)
    throw new ConfigError(
      `strepro: invalid user config ${file}\n${formatZodError(parsed.error)}`,
      file,
    );
  return parsed.data;
};
