import { describe, expect, it } from 'vitest';

import { categoryForCode, resolveCategory } from './categories';
import { listErrorCodes, lookupError, parseCodeArg } from './codes';

describe('error code table', () => {
  it('returns table entries with category and exit class', () => {
    const e = lookupError(601);
    expect(e.known).toBe(true);
    expect(e.name).toBe('file-not-found');
    expect(e.category).toBe('File I/O');
    expect(e.exitCode).toBe(3);
    expect(e.docRef).toBe(
      'help r(601); https://www.stata.com/manuals/perror.pdf',
    );
  });

  it('maps the stable exit classes', () => {
    expect(lookupError(199).exitCode).toBe(2);
    expect(lookupError(111).exitCode).toBe(2);
    expect(lookupError(950).exitCode).toBe(4);
    expect(lookupError(430).exitCode).toBe(6);
    expect(lookupError(9).exitCode).toBe(1);
    expect(lookupError(3200).exitCode).toBe(1);
  });

  it('falls back to ranges for unlisted codes', () => {
    const sys = lookupError(800);
    expect(sys.known).toBe(false);
    expect(sys.name).toBe('r800');
    expect(sys.category).toBe('System');
    expect(sys.exitCode).toBe(10);
    expect(sys.description).toBe('System error');

    expect(lookupError(650).exitCode).toBe(3);
    expect(lookupError(2999).category).toBe('Non-errors');
    expect(lookupError(2999).exitCode).toBe(1);
    expect(lookupError(99999).category).toBe('General');
    expect(lookupError(99999).exitCode).toBe(1);
  });

  it('assigns categories by range boundaries', () => {
    expect(categoryForCode(99)).toBe('General');
    expect(categoryForCode(100)).toBe('Syntax/Command');
    expect(categoryForCode(7150)).toBe('Python runtime');
    expect(categoryForCode(5000)).toBe('General');
    expect(categoryForCode(9000)).toBe('System failure');
  });

  it('lists known codes of a category in ascending order', () => {
    const file = listErrorCodes('File I/O');
    expect(file[0]?.code).toBe(601);
    expect(file.every((c) => c.category === 'File I/O')).toBe(true);
    const all = listErrorCodes();
    expect(all.length).toBeGreaterThan(150);
  });

  it('parses code arguments', () => {
    expect(parseCodeArg('601')).toBe(601);
    expect(parseCodeArg('r(601)')).toBe(601);
    expect(parseCodeArg(' r(198); ')).toBe(198);
    expect(parseCodeArg('abc')).toBeUndefined();
    expect(parseCodeArg('0')).toBeUndefined();
  });

  it('resolves category names case-insensitively', () => {
    expect(resolveCategory('file i/o')).toBe('File I/O');
    expect(resolveCategory('nope')).toBeUndefined();
  });
});
