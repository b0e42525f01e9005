/* src/runner/errors/log-parser.ts
 * Batch-log verdicts. The only authoritative error signal is an r(N); status
 * line directly after the final "end of do-file" marker.
 */
import { type ErrorCode, lookupError } from './codes';

export const END_MARKER = 'end of do-file';
const BREAK_MARKER = '--Break--';
const STATUS_RE = /^\s*r\((\d+)\);\s*$/;
const MAX_MESSAGE_LINES = 3;

export type ErrorOccurrence = ErrorCode & {
  /** Text Stata printed above the status line, or the table description. */
  message: string;
  /** 1-based line of the trailing status marker, when the window start is known. */
  line?: number;
};

export type LogVerdict = {
  /** False when no completion marker was found (killed or crashed run). */
  completed: boolean;
  errors: ErrorOccurrence[];
};

/** `. cmd`, bare `.`, `> continuation`, or a numbered loop echo such as `2. cmd`. */
export const isCommandEcho = (trimmed: string): boolean =>
  trimmed === '.' ||
  trimmed.startsWith('. ') ||
  trimmed.startsWith('> ') ||
  /^\d+\.(?: |$)/.test(trimmed);

/**
 * Message for a status code: up to three non-empty lines above the first body
 * occurrence of `r(N);`, stopping at a command echo or a blank after text.
 */
export const extractErrorMessage = (
  lines: readonly string[],
  bodyEnd: number,
  code: number,
): string | undefined => {
  const target = `r(${String(code)});`;
  const at = lines.slice(0, bodyEnd).findIndex((l) => l.trim() === target);
  if (at < 0) return undefined;

  const picked: string[] = [];
  for (let i = at - 1; i >= 0; i -= 1) {
    const t = (lines[i] ?? '').trim();
    if (!t) {
      if (picked.length > 0) break;
      continue;
    }
    if (t === BREAK_MARKER) continue;
    if (isCommandEcho(t)) break;
    picked.push(t);
    if (picked.length >= MAX_MESSAGE_LINES) break;
  }
  return picked.length > 0 ? picked.reverse().join('\n') : undefined;
};

/**
 * Classify a window of log lines.
 * @param firstLine - 1-based line number of lines[0], when known.
 */
export const parseLogLines = (
  lines: readonly string[],
  firstLine?: number,
): LogVerdict => {
  let marker = -1;
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    if ((lines[i] ?? '').trim() === END_MARKER) {
      marker = i;
      break;
    }
  }
  if (marker < 0) return { completed: false, errors: [] };

  for (let i = marker + 1; i < lines.length; i += 1) {
    const t = (lines[i] ?? '').trim();
    if (!t || t === BREAK_MARKER) continue;
    const m = STATUS_RE.exec(t);
    if (!m?.[1]) break;
    const code = Number.parseInt(m[1], 10);
    const info = lookupError(code);
    return {
      completed: true,
      errors: [
        {
          ...info,
          message:
            extractErrorMessage(lines, marker, code) ?? info.description,
          ...(typeof firstLine === 'number' ? { line: firstLine + i } : {}),
        },
      ],
    };
  }
  return { completed: true, errors: [] };
};

/** Convenience for whole-text input (tests, small logs). */
export const parseLogText = (text: string): LogVerdict => {
  const lines = text.split(/\r?\n/);
  return parseLogLines(lines, 1);
};
