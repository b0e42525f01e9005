/* src/runner/version.ts
 * Tool version (from this package's package.json) and version report.
 */
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_TOOL_VERSION } from '@/runner/util/debug-scopes';

const PACKAGE_NAME = 'stata-repro';
const pkgSchema = z.object({ name: z.string(), version: z.string() });

let cached: string | undefined;

/** Walk upward from this module to the package root and read its version. */
export const toolVersion = (): string => {
  if (cached) return cached;
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 8; i += 1) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) {
      try {
        const pkg = pkgSchema.parse(JSON.parse(readFileSync(candidate, 'utf8')));
        if (pkg.name === PACKAGE_NAME) {
          cached = pkg.version;
          return cached;
        }
      } catch (e) {
        debugFallback(DBG_SCOPE_TOOL_VERSION, `${candidate}: ${reasonOf(e)}`);
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  cached = '0.0.0';
  return cached;
};
