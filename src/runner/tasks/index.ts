/* src/runner/tasks/index.ts
 * Named tasks from the manifest.
 */
export * from './graph';
export * from './plan';
export * from './run';
