/* src/runner/errors/codes.ts
 * Static r() code table (codes.json) indexed once, with range fallback.
 */
import { z } from 'zod';

import {
  categoryForCode,
  type ErrorCategory,
  exitCodeForCategory,
} from './categories';
import table from './codes.json';

export const ERROR_MANUAL_URL = 'https://www.stata.com/manuals/perror.pdf';

export type ErrorCode = {
  code: number;
  /** Canonical short name; `r<code>` for codes outside the table. */
  name: string;
  category: ErrorCategory;
  description: string;
  /** `help r(<code>)` plus the manual URL. */
  docRef: string;
  exitCode: number;
  /** False when only the range fallback applied. */
  known: boolean;
};

const entrySchema = z.array(
  z.object({
    code: z.number().int().positive(),
    name: z.string().min(1),
    description: z.string().min(1),
  }),
);

let index: Map<number, ErrorCode> | undefined;

const docRefFor = (code: number): string =>
  `help r(${String(code)}); ${ERROR_MANUAL_URL}`;

const build = (): Map<number, ErrorCode> => {
  const out = new Map<number, ErrorCode>();
  for (const e of entrySchema.parse(table)) {
    const category = categoryForCode(e.code);
    out.set(e.code, {
      ...e,
      category,
      docRef: docRefFor(e.code),
      exitCode: exitCodeForCategory(category),
      known: true,
    });
  }
  return out;
};

const codes = (): Map<number, ErrorCode> => (index ??= build());

/** Look up a code; unlisted codes get a range-derived record. */
export const lookupError = (code: number): ErrorCode => {
  const hit = codes().get(code);
  if (hit) return hit;
  const category = categoryForCode(code);
  return {
    code,
    name: `r${String(code)}`,
    category,
    description: `${category} error`,
    docRef: docRefFor(code),
    exitCode: exitCodeForCategory(category),
    known: false,
  };
};

/** Known codes, ascending; optionally restricted to one category. */
export const listErrorCodes = (category?: ErrorCategory): ErrorCode[] =>
  [...codes().values()]
    .filter((c) => !category || c.category === category)
    .sort((a, b) => a.code - b.code);

/** Parse `601`, `r(601)`, `r(601);` into a code. */
export const parseCodeArg = (raw: string): number | undefined => {
  const m = /^\s*(?:r\()?(\d+)\)?;?\s*$/i.exec(raw);
  if (!m?.[1]) return undefined;
  const n = Number.parseInt(m[1], 10);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
};

/** `explain` lookup: accepts `601` or `r(601)`; undefined for unparseable input. */
export const explainCode = (raw: string): ErrorCode | undefined => {
  const code = parseCodeArg(raw);
  return code === undefined ? undefined : lookupError(code);
};
