/* src/cli/index.ts
 * Root CLI factory. Builds the command tree without side effects so tests can
 * parse argv against a fresh instance.
 */
import { Command } from 'commander';

import { renderAvailableTasksHelp } from '@/runner/help';
import { toolVersion } from '@/runner/version';

import { registerBench } from './bench';
import { registerCache } from './cache';
import { applyCliSafety } from './cli-utils';
import { registerDeps } from './deps';
import { registerEnv } from './env';
import { registerExplain } from './explain';
import { registerInit } from './init';
import { registerPackages } from './packages';
import { registerRun } from './run';
import { registerTask } from './task';
import { registerTest } from './testing';

type RootFlags = { debug?: boolean; boring?: boolean; version?: boolean };

/** Root flags become environment so every module sees them. */
const applyRootFlags = (flags: RootFlags): void => {
  if (flags.debug) process.env.STREPRO_DEBUG = '1';
  if (flags.boring) {
    process.env.STREPRO_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  }
};

export const versionLine = (): string =>
  `strepro ${toolVersion()} (node ${process.versions.node}, ${process.platform})`;

/**
 * Build the root CLI (`strepro`).
 *
 * Root options are positional: `-d`, `-b` and `-v` go before the subcommand,
 * so subcommands are free to define `-v/--verbose` and `--version`.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  cli
    .name('strepro')
    .description(
      'Run Stata do-files reproducibly: isolated packages from a lockfile, verdicts from the log, stable exit codes.',
    )
    .enablePositionalOptions()
    .option('-d, --debug', 'print debug notices (same as STREPRO_DEBUG=1)')
    .option('-b, --boring', 'disable color and styling (useful for tests/CI)')
    .option('-v, --version', 'print the version');

  cli.addHelpText('after', () => renderAvailableTasksHelp(process.cwd()));

  cli.hook('preAction', () => {
    applyRootFlags(cli.opts<RootFlags>());
  });

  registerRun(cli);
  registerBench(cli);
  registerTest(cli);
  registerTask(cli);
  registerDeps(cli);
  registerPackages(cli);
  registerCache(cli);
  registerEnv(cli);
  registerExplain(cli);
  registerInit(cli);

  // Root action: version, else help (without .help(), which exits).
  cli.action(() => {
    const [stray] = cli.args;
    if (stray !== undefined)
      cli.error(`error: unknown command '${stray}'`, { code: 'commander.unknownCommand' });
    if (cli.opts<RootFlags>().version) {
      console.log(versionLine());
      return;
    }
    console.log(cli.helpInformation());
  });

  applyCliSafety(cli);
  return cli;
};
