/* src/runner/errors/categories.ts
 * Range-based categories for Stata r() codes and their exit classes.
 */
import { EXIT } from '@/common/errors';

export const CATEGORIES = [
  'General',
  'Syntax/Command',
  'Reserved',
  'Previously stored result',
  'Statistical problems',
  'Matrix manipulation',
  'File I/O',
  'Operating system',
  'System',
  'Memory/Resources',
  'System limits',
  'Non-errors',
  'Mata runtime',
  'Class system',
  'Python runtime',
  'System failure',
] as const;

export type ErrorCategory = (typeof CATEGORIES)[number];

const RANGES: ReadonlyArray<readonly [number, number, ErrorCategory]> = [
  [1, 99, 'General'],
  [100, 199, 'Syntax/Command'],
  [200, 299, 'Reserved'],
  [300, 399, 'Previously stored result'],
  [400, 499, 'Statistical problems'],
  [500, 599, 'Matrix manipulation'],
  [600, 699, 'File I/O'],
  [700, 799, 'Operating system'],
  [800, 899, 'System'],
  [900, 999, 'Memory/Resources'],
  [1000, 1999, 'System limits'],
  [2000, 2999, 'Non-errors'],
  [3000, 3999, 'Mata runtime'],
  [4000, 4999, 'Class system'],
  [7100, 7199, 'Python runtime'],
  [9000, 9999, 'System failure'],
];

/** Category for any code; unknown ranges are General. */
export const categoryForCode = (code: number): ErrorCategory => {
  for (const [lo, hi, cat] of RANGES) if (code >= lo && code <= hi) return cat;
  return 'General';
};

/** Exit class for a category. Everything unlisted is a generic Stata error. */
export const exitCodeForCategory = (category: ErrorCategory): number => {
  switch (category) {
    case 'Syntax/Command':
      return EXIT.syntax;
    case 'File I/O':
      return EXIT.file;
    case 'Memory/Resources':
      return EXIT.memory;
    case 'Statistical problems':
      return EXIT.statistical;
    case 'System':
      return EXIT.environment;
    default:
      return EXIT.stata;
  }
};

/** Case-insensitive category lookup (for CLI input). */
export const resolveCategory = (s: string): ErrorCategory | undefined =>
  CATEGORIES.find((c) => c.toLowerCase() === s.trim().toLowerCase());
