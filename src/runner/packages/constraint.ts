/* src/runner/packages/constraint.ts
 * Version constraints: comma-separated comparators over digit-run versions.
 * `2024-01-15` and `20240115` compare equal; segments compare numerically.
 */

export type Comparator = '=' | '>=' | '<=' | '>' | '<';

export type Clause = { op: Comparator; version: string };

const CLAUSE_RE = /^(>=|<=|=|>|<)?\s*(\S+)$/;

/** Digit runs; a version that is all digits and separators compares as one number. */
const segments = (v: string): number[] => {
  const compact = v.replace(/[-_/]/g, '');
  if (/^\d+$/.test(compact)) return [Number.parseInt(compact, 10)];
  return (v.match(/\d+/g) ?? []).map((d) => Number.parseInt(d, 10));
};

export const compareVersions = (a: string, b: string): number => {
  const sa = segments(a);
  const sb = segments(b);
  const n = Math.max(sa.length, sb.length);
  for (let i = 0; i < n; i += 1) {
    const d = (sa[i] ?? 0) - (sb[i] ?? 0);
    if (d !== 0) return d < 0 ? -1 : 1;
  }
  if (sa.length === 0 && sb.length === 0) return a.localeCompare(b);
  return 0;
};

/** Parse a constraint; throws on malformed clauses. */
export const parseConstraint = (raw: string): Clause[] =>
  raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => {
      const m = CLAUSE_RE.exec(s);
      if (!m?.[2]) throw new Error(`invalid version constraint: "${raw}"`);
      const op: Comparator =
        m[1] === '>=' || m[1] === '<=' || m[1] === '>' || m[1] === '<'
          ? m[1]
          : '=';
      return { op, version: m[2] };
    });

const holds = (version: string, { op, version: want }: Clause): boolean => {
  const c = compareVersions(version, want);
  switch (op) {
    case '=':
      return c === 0;
    case '>=':
      return c >= 0;
    case '<=':
      return c <= 0;
    case '>':
      return c > 0;
    case '<':
      return c < 0;
  }
};

/** True when there is no constraint or every clause holds. */
export const satisfies = (version: string, constraint?: string): boolean =>
  !constraint?.trim() ||
  parseConstraint(constraint).every((c) => holds(version, c));
