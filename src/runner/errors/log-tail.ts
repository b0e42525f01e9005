/* src/runner/errors/log-tail.ts
 * Bounded trailing window over a (possibly huge) batch log.
 * Reads backwards in chunks until enough lines are held or the byte cap is hit.
 */
import { open } from 'node:fs/promises';

export const DEFAULT_TAIL_LINES = 50;
export const DEFAULT_TAIL_CHUNK = 64 * 1024;
export const DEFAULT_TAIL_MAX_BYTES = 1024 * 1024;

export type TailOptions = {
  maxLines?: number;
  chunkSize?: number;
  maxBytes?: number;
};

export type LogTail = {
  /** Last lines of the file, oldest first, without line terminators. */
  lines: string[];
  /** 1-based line number of lines[0]; known only when the window reached the file start. */
  firstLine?: number;
  bytesRead: number;
  fileSize: number;
};

/** Split text into lines; a trailing terminator does not make an extra line. */
export const splitLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
};

export const readLogTail = async (
  path: string,
  opts?: TailOptions,
): Promise<LogTail> => {
  const maxLines = Math.max(1, opts?.maxLines ?? DEFAULT_TAIL_LINES);
  const chunkSize = Math.max(1, opts?.chunkSize ?? DEFAULT_TAIL_CHUNK);
  const maxBytes = Math.max(1, opts?.maxBytes ?? DEFAULT_TAIL_MAX_BYTES);

  const fh = await open(path, 'r');
  try {
    const { size } = await fh.stat();
    const chunks: Buffer[] = [];
    let pos = size;
    let bytesRead = 0;
    let newlines = 0;

    // One newline more than maxLines guarantees the oldest kept line is whole.
    while (pos > 0 && bytesRead < maxBytes && newlines <= maxLines) {
      const len = Math.min(chunkSize, pos, maxBytes - bytesRead);
      pos -= len;
      const buf = Buffer.alloc(len);
      const { bytesRead: n } = await fh.read(buf, 0, len, pos);
      const got = buf.subarray(0, n);
      chunks.unshift(got);
      bytesRead += n;
      for (const b of got) if (b === 0x0a) newlines += 1;
      if (n < len) break;
    }

    const lines = splitLines(Buffer.concat(chunks).toString('utf8'));
    const atStart = pos === 0;
    // Partial first line when the window starts mid-file.
    if (!atStart) lines.shift();
    const dropped = Math.max(0, lines.length - maxLines);
    return {
      lines: lines.slice(dropped),
      firstLine: atStart ? dropped + 1 : undefined,
      bytesRead,
      fileSize: size,
    };
  } finally {
    await fh.close();
  }
};
