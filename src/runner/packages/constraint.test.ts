import { describe, expect, it } from 'vitest';

import { compareVersions, parseConstraint, satisfies } from './constraint';

describe('compareVersions', () => {
  it('treats dashed and compact dates as equal', () => {
    expect(compareVersions('2024-01-15', '20240115')).toBe(0);
  });

  it('compares segments numerically', () => {
    expect(compareVersions('1.10', '1.9')).toBe(1);
    expect(compareVersions('1.2', '1.2.1')).toBe(-1);
    expect(compareVersions('20230101', '20240101')).toBe(-1);
  });
});

describe('satisfies', () => {
  it('accepts anything without a constraint', () => {
    expect(satisfies('20240115')).toBe(true);
    expect(satisfies('20240115', '  ')).toBe(true);
  });

  it('treats a bare version as equality', () => {
    expect(satisfies('2024-01-15', '20240115')).toBe(true);
    expect(satisfies('20240116', '2024-01-15')).toBe(false);
  });

  it('requires every clause of a range', () => {
    expect(satisfies('1.5', '>=1.2, <2')).toBe(true);
    expect(satisfies('2.0', '>=1.2, <2')).toBe(false);
    expect(satisfies('1.1', '>=1.2, <2')).toBe(false);
  });

  it('supports every comparator', () => {
    expect(satisfies('3', '>2')).toBe(true);
    expect(satisfies('2', '<=2')).toBe(true);
    expect(satisfies('2', '=2')).toBe(true);
  });
});

describe('parseConstraint', () => {
  it('splits clauses and defaults the operator', () => {
    expect(parseConstraint('>= 20230101, 2.0')).toEqual([
      { op: '>=', version: '20230101' },
      { op: '=', version: '2.0' },
    ]);
  });

  it('rejects clauses with inner whitespace', () => {
    expect(() => parseConstraint('>= 1 2')).toThrow(/invalid version constraint/);
  });
});
