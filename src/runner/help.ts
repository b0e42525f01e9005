/* src/runner/help.ts
 * Root help footer: the project's task names and a few examples.
 */
import { readFileSync } from 'node:fs';

import { findProjectRoot, manifestIn, parseManifest } from '@/cli/config/load';
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_MANIFEST_LOAD } from '@/runner/util/debug-scopes';

/**
 * Render a help footer that lists available task names and examples.
 *
 * @param cwd - Project root (or descendant) used to locate the manifest.
 * @returns Multi-line string (empty outside a project or when the manifest cannot be loaded).
 */
export const renderAvailableTasksHelp = (cwd: string): string => {
  const root = findProjectRoot(cwd);
  const file = root ? manifestIn(root) : undefined;
  if (!file) return '';
  try {
    const manifest = parseManifest(file, readFileSync(file, 'utf8'));
    const keys = Object.keys(manifest.scripts?.tasks ?? {}).sort();
    if (!keys.length) return '';
    const example = keys[0] ?? 'main';
    return [
      '',
      'Available tasks:',
      `  ${keys.join(', ')}`,
      '',
      'Examples:',
      `  strepro task run ${example}`,
      '  strepro run analysis.do --arg SEED=42',
      '  strepro test --parallel',
      '',
    ].join('\n');
  } catch (e) {
    debugFallback(DBG_SCOPE_MANIFEST_LOAD, `help footer: ${reasonOf(e)}`);
    return '';
  }
};
