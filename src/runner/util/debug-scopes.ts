/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback notices.
 * Tests reference these exact tokens.
 */

/** manifest discovery/loader */
export const DBG_SCOPE_MANIFEST_LOAD = 'project.manifest:load';

/** user config (~/.config/strepro) */
export const DBG_SCOPE_USER_CONFIG = 'project.user-config:load';

/** interpreter binary detection */
export const DBG_SCOPE_BINARY_DETECT = 'exec.binary:detect';

/** ssc index falling back to the mirror */
export const DBG_SCOPE_SSC_MIRROR = 'packages.ssc:mirror';

/** github ref probing (main/master) and commit lookup */
export const DBG_SCOPE_GITHUB_REF = 'packages.github:ref';

/** cache staging sweep and concurrent-writer races */
export const DBG_SCOPE_CACHE_STAGE = 'packages.cache:stage';

/** supervisor kill escalation */
export const DBG_SCOPE_SUPERVISOR_KILL = 'exec.supervisor:kill';

/** temporary do-file cleanup */
export const DBG_SCOPE_EXEC_CLEANUP = 'exec.run-one:cleanup';

/** package.json lookup for the tool version */
export const DBG_SCOPE_TOOL_VERSION = 'runner.version:read';

/** signal handler install/teardown */
export const DBG_SCOPE_SESSION_SIGNALS = 'exec.signals:session';

/** verbose-mode log following */
export const DBG_SCOPE_LOG_FOLLOW = 'exec.log-follow:read';
