import { describe, expect, it } from 'vitest';

import {
  extractErrorMessage,
  isCommandEcho,
  parseLogLines,
  parseLogText,
} from './log-parser';

describe('parseLogText', () => {
  it('detects a terminating status marker after the final end marker', () => {
    const log = [
      '. thisisnotacommand',
      'command thisisnotacommand is unrecognized',
      'r(199);',
      '',
      'end of do-file',
      'r(199);',
      '',
    ].join('\n');
    const v = parseLogText(log);
    expect(v.completed).toBe(true);
    expect(v.errors).toHaveLength(1);
    const [e] = v.errors;
    expect(e?.code).toBe(199);
    expect(e?.name).toBe('unrecognized-command');
    expect(e?.exitCode).toBe(2);
    expect(e?.message).toBe('command thisisnotacommand is unrecognized');
    expect(e?.line).toBe(6);
  });

  it('reports success when nothing follows the end marker', () => {
    const v = parseLogText('. display "hello"\nhello\n\nend of do-file\n');
    expect(v).toEqual({ completed: true, errors: [] });
  });

  it('ignores status-looking text displayed in the body', () => {
    const log = '. display "r(601);"\nr(601);\n\nend of do-file\n';
    expect(parseLogText(log).errors).toEqual([]);
  });

  it('treats captured errors as success', () => {
    const log =
      '. capture confirm file "missing.csv"\n\n. display _rc\n601\n\nend of do-file\n';
    expect(parseLogText(log).errors).toEqual([]);
  });

  it('skips --Break-- markers around the status line', () => {
    const log = [
      '. error 1',
      '--Break--',
      'r(1);',
      '',
      'end of do-file',
      '--Break--',
      'r(1);',
    ].join('\n');
    const [e] = parseLogText(log).errors;
    expect(e?.code).toBe(1);
    expect(e?.category).toBe('General');
    expect(e?.exitCode).toBe(1);
    expect(e?.message).toBe('You pressed Break; execution was interrupted');
  });

  it('uses the last end marker for nested do-files', () => {
    const log = [
      '. do helper.do',
      '. use missing',
      'file missing.dta not found',
      'r(601);',
      '',
      'end of do-file',
      'r(601);',
      '',
      'end of do-file',
      'r(601);',
    ].join('\n');
    const [e] = parseLogText(log).errors;
    expect(e?.exitCode).toBe(3);
    expect(e?.message).toBe('file missing.dta not found');
    expect(e?.line).toBe(10);
  });

  it('stops at the first other line after the marker', () => {
    const v = parseLogText('end of do-file\nsome text\nr(198);\n');
    expect(v).toEqual({ completed: true, errors: [] });
  });

  it('flags a log without an end marker as incomplete', () => {
    expect(parseLogText('running\nmore output\n')).toEqual({
      completed: false,
      errors: [],
    });
  });

  it('falls back to the range description for unlisted codes', () => {
    const [e] = parseLogText('end of do-file\nr(4321);\n').errors;
    expect(e?.name).toBe('r4321');
    expect(e?.category).toBe('Class system');
    expect(e?.message).toBe('Class system error');
    expect(e?.exitCode).toBe(1);
  });

  it('maps statistical, memory and system codes', () => {
    expect(parseLogText('end of do-file\nr(430);').errors[0]?.exitCode).toBe(
      6,
    );
    expect(parseLogText('end of do-file\nr(950);').errors[0]?.exitCode).toBe(
      4,
    );
    expect(parseLogText('end of do-file\nr(800);').errors[0]?.exitCode).toBe(
      10,
    );
  });
});

describe('parseLogLines', () => {
  it('offsets line numbers by the window start', () => {
    const v = parseLogLines(['x', 'end of do-file', 'r(111);'], 41);
    expect(v.errors[0]?.line).toBe(43);
  });

  it('omits line numbers when the window start is unknown', () => {
    const v = parseLogLines(['end of do-file', 'r(111);']);
    expect(v.errors[0]).not.toHaveProperty('line');
  });
});

describe('extractErrorMessage', () => {
  it('keeps at most three lines above the status', () => {
    const lines = ['. regress y x', 'a', 'b', 'c', 'd', 'r(198);', ''];
    expect(extractErrorMessage(lines, 6, 198)).toBe('b\nc\nd');
  });

  it('stops at a blank line once text is collected', () => {
    const lines = ['old output', '', 'variable z not found', 'r(111);'];
    expect(extractErrorMessage(lines, 4, 111)).toBe('variable z not found');
  });

  it('returns undefined without a body occurrence', () => {
    expect(extractErrorMessage(['hello'], 1, 111)).toBeUndefined();
  });
});

describe('isCommandEcho', () => {
  it('recognizes echo shapes', () => {
    expect(isCommandEcho('. reg y x')).toBe(true);
    expect(isCommandEcho('.')).toBe(true);
    expect(isCommandEcho('> , robust')).toBe(true);
    expect(isCommandEcho('2. display 1')).toBe(true);
    expect(isCommandEcho('10.')).toBe(true);
    expect(isCommandEcho('3.5 is a number')).toBe(false);
    expect(isCommandEcho('r(1);')).toBe(false);
  });
});
