/* src/runner/init/gitignore.ts */
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

/**
 * Ensure `.gitignore` covers batch logs and the temporary do-files written
 * for inline and traced runs. Creates `.gitignore` when missing.
 *
 * @param root - Project root.
 * @param logDir - Log directory from the manifest, when one is set.
 * @returns The lines that were added.
 */
export const ensureProjectGitignore = async (
  root: string,
  logDir?: string,
): Promise<string[]> => {
  const giPath = path.join(root, '.gitignore');
  const linesToEnsure = [
    '*.log',
    '_strepro_inline_*.do',
    '*_strepro_trace_*.do',
    ...(logDir ? [`${logDir.replace(/\\/g, '/').replace(/\/+$/, '')}/`] : []),
  ];

  let gi = existsSync(giPath) ? await readFile(giPath, 'utf8') : '';
  const existing = new Set(gi.split(/\r?\n/).map((l) => l.trim()));
  const added: string[] = [];
  for (const l of linesToEnsure) {
    if (!existing.has(l)) {
      if (gi.length && !gi.endsWith('\n')) gi += '\n';
      gi += `${l}\n`;
      added.push(l);
    }
  }
  if (added.length) await writeFile(giPath, gi, 'utf8');
  return added;
};
