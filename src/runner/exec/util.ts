/* src/runner/exec/util.ts
 * Scheduling helpers.
 */

/** Yield one event-loop tick so pending signal handlers can run before a spawn. */
export const yieldToEventLoop = (): Promise<void> =>
  new Promise<void>((resolveP) => setImmediate(resolveP));
