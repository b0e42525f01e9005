/* src/runner/exec/log-follow.ts
 * Follow a growing log file and emit complete lines (verbose mode).
 */
import { open } from 'node:fs/promises';

import { pathExists } from 'fs-extra';

import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_LOG_FOLLOW } from '@/runner/util/debug-scopes';

export type LogFollower = {
  /** Stop polling, flush what is left and emit any final partial line. */
  stop: () => Promise<void>;
};

export const DEFAULT_POLL_MS = 100;

export const followLog = (
  file: string,
  onLine: (line: string) => void,
  pollMs = DEFAULT_POLL_MS,
): LogFollower => {
  let offset = 0;
  let pending = '';
  let busy: Promise<void> = Promise.resolve();
  const decoder = new TextDecoder('utf-8');

  const drain = async (): Promise<void> => {
    if (!(await pathExists(file))) return;
    const fh = await open(file, 'r');
    try {
      const buf = Buffer.alloc(64 * 1024);
      for (;;) {
        const { bytesRead } = await fh.read(buf, 0, buf.length, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
        pending += decoder.decode(buf.subarray(0, bytesRead), { stream: true });
        const parts = pending.split(/\r?\n/);
        pending = parts.pop() ?? '';
        for (const l of parts) onLine(l);
      }
    } finally {
      await fh.close();
    }
  };

  const tick = (): void => {
    busy = busy.then(drain).catch((e: unknown) => {
      debugFallback(DBG_SCOPE_LOG_FOLLOW, `${file}: ${reasonOf(e)}`);
    });
  };
  const timer = setInterval(tick, pollMs);

  return {
    stop: async () => {
      clearInterval(timer);
      tick();
      await busy;
      if (pending) onLine(pending);
      pending = '';
    },
  };
};
