/* src/test/fake-engine.ts
 * Engine that runs the stand-in interpreter under the current Node binary.
 */
import { fileURLToPath } from 'node:url';

import type { Engine } from '@/runner/exec/binary';

export const FAKE_STATA = fileURLToPath(
  new URL('./fixtures/fake-stata.mjs', import.meta.url),
);

export const fakeEngine: Engine = Object.freeze({
  command: process.execPath,
  args: Object.freeze([FAKE_STATA]),
});
