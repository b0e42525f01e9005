/* src/runner/exec/supervisor.ts
 * Tracks child pids and tree-kills them on cancellation.
 * POSIX children lead their own process group (spawned detached) and are
 * signalled as a group; Windows trees go through tree-kill (taskkill /T).
 */
import treeKill from 'tree-kill';

import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_SUPERVISOR_KILL } from '@/runner/util/debug-scopes';

export const DEFAULT_KILL_GRACE_MS = 5_000;
const POLL_MS = 50;

/** Spawn option: POSIX children get their own process group. */
export const GROUP_SPAWN = process.platform !== 'win32';

const killGroup = (pid: number, signal: NodeJS.Signals): void => {
  try {
    process.kill(-pid, signal);
  } catch (e) {
    // not a group leader (or already gone): signal the process itself
    debugFallback(DBG_SCOPE_SUPERVISOR_KILL, `group ${String(pid)}: ${reasonOf(e)}`);
    try {
      process.kill(pid, signal);
    } catch (inner) {
      debugFallback(
        DBG_SCOPE_SUPERVISOR_KILL,
        `${signal} ${String(pid)}: ${reasonOf(inner)}`,
      );
    }
  }
};

const killTree = (pid: number, signal: NodeJS.Signals): Promise<void> => {
  if (GROUP_SPAWN) {
    killGroup(pid, signal);
    return Promise.resolve();
  }
  return new Promise((resolveP) => {
    treeKill(pid, signal, (err) => {
      if (err)
        debugFallback(
          DBG_SCOPE_SUPERVISOR_KILL,
          `${signal} ${String(pid)}: ${reasonOf(err)}`,
        );
      resolveP();
    });
  });
};

const alive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
};

export class ProcessSupervisor {
  private readonly pids = new Map<string, number>();
  private cancelled = false;

  constructor(private readonly graceMs = DEFAULT_KILL_GRACE_MS) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  track(key: string, pid: number): void {
    this.pids.set(key, pid);
    // A child that slipped in after cancellation goes straight down.
    if (this.cancelled) void this.terminate(pid);
  }

  untrack(key: string): void {
    this.pids.delete(key);
  }

  tracked(): number[] {
    return [...this.pids.values()];
  }

  /** SIGTERM one process tree, then SIGKILL it after the grace period. */
  async terminate(pid: number, graceMs = this.graceMs): Promise<void> {
    await killTree(pid, 'SIGTERM');
    const deadline = Date.now() + graceMs;
    while (alive(pid)) {
      if (Date.now() >= deadline) {
        debugFallback(DBG_SCOPE_SUPERVISOR_KILL, `escalating ${String(pid)} to SIGKILL`);
        await killTree(pid, 'SIGKILL');
        return;
      }
      await new Promise<void>((r) => setTimeout(r, POLL_MS).unref());
    }
  }

  /** Synchronous SIGKILL of every tracked tree (process exit path). */
  killAllNow(): void {
    for (const pid of this.tracked()) {
      if (GROUP_SPAWN) killGroup(pid, 'SIGKILL');
      else
        try {
          process.kill(pid, 'SIGKILL');
        } catch (e) {
          debugFallback(
            DBG_SCOPE_SUPERVISOR_KILL,
            `exit kill ${String(pid)}: ${reasonOf(e)}`,
          );
        }
    }
  }

  /** Mark cancelled and terminate every tracked tree. */
  async cancelAll(): Promise<void> {
    this.cancelled = true;
    await Promise.all(this.tracked().map((pid) => this.terminate(pid)));
  }
}
