/* src/runner/packages/schema.ts
 * Zod schemas for the on-disk package records (lockfile, cache entry metadata).
 */
import { z } from 'zod';

import { DEPENDENCY_GROUPS, LOCKFILE_FORMAT } from './types';

export const packageSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ssc') }).strict(),
  z
    .object({
      type: z.literal('github'),
      repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'expected user/repo'),
      ref: z.string().min(1).optional(),
      commit: z.string().min(7).optional(),
    })
    .strict(),
  z.object({ type: z.literal('net'), url: z.string().url() }).strict(),
  z.object({ type: z.literal('local'), path: z.string().min(1) }).strict(),
]);

export const lockEntrySchema = z
  .object({
    version: z.string().min(1),
    source: packageSourceSchema,
    checksum: z.string().regex(/^sha256:[0-9a-f]{64}$/, 'expected sha256:<hex>'),
    group: z.enum(DEPENDENCY_GROUPS),
  })
  .strict();

export const lockfileSchema = z
  .object({
    version: z.literal(LOCKFILE_FORMAT),
    tool: z.string(),
    manifestHash: z.string(),
    packages: z.record(z.string(), lockEntrySchema),
  })
  .strict();

export const cacheEntryMetaSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  source: packageSourceSchema,
  checksum: z.string(),
  files: z.array(z.string()),
  createdAt: z.string(),
});
export type CacheEntryMeta = z.infer<typeof cacheEntryMetaSchema>;
