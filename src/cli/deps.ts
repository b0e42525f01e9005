/* src/cli/deps.ts
 * `strepro deps <script>`: inclusion/requirement tree, cycles and missing files.
 */
import type { Command } from 'commander';

import { analyzeDependencies, formatTree } from '@/runner/deps';
import { dim, warn } from '@/runner/util/color';

import {
  addFormatOptions,
  emitJson,
  formatOf,
  type FormatFlags,
  guard,
  renderTable,
  say,
} from './output';

export type DepsFlags = FormatFlags & { flat?: boolean };

export const depsAction = async (script: string, flags: DepsFlags): Promise<void> => {
  const report = await analyzeDependencies(script);
  const { summary } = report;

  if (formatOf(flags) === 'json') {
    emitJson({
      root: report.graph.root,
      summary,
      ...(flags.flat ? { dependencies: report.flat } : { tree: report.tree }),
    });
    return;
  }

  if (flags.flat)
    console.log(
      renderTable(
        ['Depth', 'Kind', 'Dependency'],
        report.flat.map((d) => [
          String(d.depth),
          d.kind,
          d.exists ? d.label : `${d.label} ${warn('(not found)')}`,
        ]),
      ),
    );
  else console.log(formatTree(report.tree));

  console.log(
    dim(
      [
        `${String(summary.uniqueCount)} unique`,
        `${String(summary.missingCount)} missing`,
        `${String(summary.circularCount)} circular`,
        `${String(summary.packages.length)} package(s)`,
      ].join(', '),
    ),
  );
  for (const p of summary.circularPaths) say(warn(`circular: ${p}`));
  for (const p of summary.missingPaths) say(warn(`missing: ${p}`));
};

export const registerDeps = (cli: Command): Command => {
  addFormatOptions(
    cli
      .command('deps')
      .description('show what a do-file includes and which packages it requires')
      .argument('<script>', 'root do-file')
      .option('--flat', 'list unique dependencies with their depth'),
  ).action(guard((_s: string, flags: DepsFlags) => formatOf(flags), depsAction));
  return cli;
};
