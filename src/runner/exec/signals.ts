/* src/runner/exec/signals.ts
 * Wire SIGINT/SIGTERM to an orchestration's AbortController and supervisor.
 */
import { debugFallback, reasonOf } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION_SIGNALS } from '@/runner/util/debug-scopes';

import type { ProcessSupervisor } from './supervisor';

export type Session = {
  controller: AbortController;
  supervisor: ProcessSupervisor;
};

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Install handlers for the duration of a session. The first signal aborts
 * and tree-kills every tracked child; on process exit any child still
 * tracked is killed outright. Returns the detach function.
 */
export const attachSessionSignals = ({ controller, supervisor }: Session): (() => void) => {
  const onSignal = (sig: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    controller.abort(new Error(`received ${sig}`));
    supervisor.cancelAll().catch((e: unknown) => {
      debugFallback(DBG_SCOPE_SESSION_SIGNALS, `cancel: ${reasonOf(e)}`);
    });
  };
  const onExit = (): void => {
    supervisor.killAllNow();
  };

  for (const s of SIGNALS) process.on(s, onSignal);
  process.on('exit', onExit);
  return () => {
    for (const s of SIGNALS) process.off(s, onSignal);
    process.off('exit', onExit);
  };
};
