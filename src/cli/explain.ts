/* src/cli/explain.ts
 * `strepro explain <code>` and `strepro explain --category <name>`.
 */
import type { Command } from 'commander';

import { EnvironmentError } from '@/common/errors';
import { CATEGORIES, resolveCategory } from '@/runner/errors/categories';
import { type ErrorCode, explainCode, listErrorCodes } from '@/runner/errors/codes';
import { bold, dim } from '@/runner/util/color';

import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  renderTable,
} from './output';

export type ExplainFlags = FormatFlags & { category?: string };

const codeJson = (c: ErrorCode): Record<string, unknown> => ({
  code: c.code,
  name: c.name,
  category: c.category,
  description: c.description,
  docRef: c.docRef,
  exitCode: c.exitCode,
  known: c.known,
});

export const explainAction = (raw: string | undefined, flags: ExplainFlags): void => {
  const json = formatOf(flags) === 'json';

  if (flags.category !== undefined) {
    const category = resolveCategory(flags.category);
    if (!category)
      throw new EnvironmentError(
        `unknown category "${flags.category}" (one of: ${CATEGORIES.join(', ')})`,
      );
    const codes = listErrorCodes(category);
    if (json) emitJson({ category, codes: codes.map(codeJson) });
    else
      console.log(
        renderTable(
          ['Code', 'Name', 'Description'],
          codes.map((c) => [`r(${String(c.code)})`, c.name, c.description]),
        ),
      );
    return;
  }

  if (raw === undefined)
    throw new EnvironmentError('give an error code or --category <name>');
  const c = explainCode(raw);
  if (!c) throw new EnvironmentError(`not an error code: ${raw}`);
  if (json) {
    emitJson(codeJson(c));
    return;
  }
  console.log(
    `${bold(`r(${String(c.code)})`)} ${c.name}${
      c.known ? '' : dim(' (not in the table)')
    }`,
  );
  console.log(`  ${c.description}`);
  console.log(`  category: ${c.category} (exit ${String(c.exitCode)})`);
  console.log(`  ${dim(c.docRef)}`);
};

export const registerExplain = (cli: Command): Command => {
  addFormatOptions(
    cli
      .command('explain')
      .description('describe an r() error code, or list the codes of a category')
      .argument('[code]', 'error code, e.g. 601 or r(601)')
      .option('--category <name>', 'list known codes in this category'),
  ).action(
    guard(
      (_c: string | undefined, flags: ExplainFlags) => formatOf(flags),
      explainAction,
    ),
  );
  return cli;
};
