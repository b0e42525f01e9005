/* src/runner/errors/index.ts
 * Error taxonomy and batch-log verdicts.
 */
export * from './categories';
export * from './codes';
export * from './detect';
export * from './log-parser';
export * from './log-tail';
