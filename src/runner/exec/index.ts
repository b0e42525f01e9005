/* src/runner/exec/index.ts
 * Isolation and execution orchestrator.
 */
export * from './binary';
export * from './isolation';
export * from './orchestrator';
export * from './run-one';
export * from './signals';
export * from './stats';
export * from './supervisor';
