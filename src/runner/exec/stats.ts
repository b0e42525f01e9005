/* src/runner/exec/stats.ts
 * Summary statistics for benchmark samples (seconds).
 */

export type BenchStats = {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  /** Population standard deviation. */
  stddev: number;
};

export const summarizeSamples = (samples: readonly number[]): BenchStats => {
  const n = samples.length;
  if (n === 0) return { count: 0, min: 0, max: 0, mean: 0, median: 0, stddev: 0 };
  const sorted = [...samples].sort((a, b) => a - b);
  const mean = sorted.reduce((s, x) => s + x, 0) / n;
  const mid = Math.floor(n / 2);
  const median =
    n % 2 === 0 ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2 : (sorted[mid] ?? 0);
  const variance = sorted.reduce((s, x) => s + (x - mean) ** 2, 0) / n;
  return {
    count: n,
    min: sorted[0] ?? 0,
    max: sorted[n - 1] ?? 0,
    mean,
    median,
    stddev: Math.sqrt(variance),
  };
};
