/* src/runner/util/debug.ts
 * Opt-in debug notices for fallback paths.
 * Emits only when STREPRO_DEBUG=1.
 */

export const debugOn = (): boolean => process.env.STREPRO_DEBUG === '1';

/** Log a concise fallback notice under STREPRO_DEBUG=1 (scope: module:function; reason/message). */
export const debugFallback = (scope: string, reason: string): void => {
  if (!debugOn()) return;
  // stderr keeps debug noise out of machine-readable stdout
  console.error(`strepro: debug: fallback: ${scope}: ${reason}`);
};

/** Render an unknown thrown value as a one-line reason. */
export const reasonOf = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
