/* src/runner/util/hash.ts
 * SHA-256 helpers for files, buffers and package digests.
 */
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

export const sha256Hex = (data: string | Uint8Array): string =>
  createHash('sha256').update(data).digest('hex');

/**
 * Compute the SHA-256 hash (hex) of a file's bytes.
 */
export const sha256File = async (abs: string): Promise<string> =>
  sha256Hex(await readFile(abs));

/**
 * Package digest: sha256 over the sorted per-file hex digests.
 * Independent of file order and file names.
 */
export const packageDigest = (fileHashes: readonly string[]): string =>
  `sha256:${sha256Hex([...fileHashes].sort().join(''))}`;

/** Stable JSON: object keys sorted recursively. */
export const canonicalJson = (value: unknown, spaces?: number): string =>
  JSON.stringify(sortKeys(value), null, spaces);

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    ))
      out[k] = sortKeys(v);
    return out;
  }
  return value;
};
