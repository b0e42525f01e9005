/** Shared Commander helpers for the strepro CLI.
 * DRY the repeated exitOverride + parse normalization across subcommands.
 */
import { type Command, CommanderError, InvalidArgumentError } from 'commander';

import { DEPENDENCY_GROUPS, type DependencyGroup } from '@/runner/packages/types';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize argv from unit tests like ["node","strepro", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!isStringArray(argv)) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'strepro') {
    return argv.slice(2);
  }
  return argv;
};

const BENIGN_EXITS = new Set<string>([
  'commander.helpDisplayed',
  'commander.help',
  'commander.version',
]);

/** Usage errors (unknown option, bad argument) exit 2. */
export const USAGE_EXIT = 2;

/** Commander exit override: throw instead of calling process.exit. */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    throw err;
  });
};

/** Apply the exit override to a command and all of its subcommands. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  cmd.commands.forEach(applyCliSafety);
}

/**
 * Parse argv (user args, or process.argv when omitted). Commander's own
 * exits become process.exitCode: 0 for help, USAGE_EXIT otherwise.
 */
export const parseCli = async (cli: Command, argv?: readonly string[]): Promise<void> => {
  const user = normalizeArgv(argv);
  try {
    if (user) await cli.parseAsync(user, { from: 'user' });
    else await cli.parseAsync();
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    process.exitCode = BENIGN_EXITS.has(e.code) ? 0 : USAGE_EXIT;
  }
};

/** Repeatable option collector (`--arg A=1 --arg B=2`). */
export const collect = (value: string, previous: string[] = []): string[] => [
  ...previous,
  value,
];

/** Positive integer option parser. */
export const positiveInt =
  (label: string) =>
  (raw: string): number => {
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0)
      throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };

/** Non-negative integer option parser (warmup counts may be zero). */
export const nonNegativeInt =
  (label: string) =>
  (raw: string): number => {
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0)
      throw new InvalidArgumentError(`${label} must be a non-negative integer`);
    return n;
  };

/** Positive number option parser (seconds, days). */
export const positiveNumber =
  (label: string) =>
  (raw: string): number => {
    const n = Number(raw);
    if (!Number.isFinite(n) || n <= 0)
      throw new InvalidArgumentError(`${label} must be a positive number`);
    return n;
  };

const isGroup = (s: string): s is DependencyGroup =>
  DEPENDENCY_GROUPS.some((g) => g === s);

/** `--group production,dev` -> groups. */
export const parseGroups = (raw: string): DependencyGroup[] => {
  const parts = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const bad = parts.filter((p) => !isGroup(p));
  if (bad.length || !parts.length)
    throw new InvalidArgumentError(
      `unknown group ${bad.join(', ') || '(none)'} (expected ${DEPENDENCY_GROUPS.join(', ')})`,
    );
  return parts.filter(isGroup);
};
