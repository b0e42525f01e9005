/* src/cli/config/schema.ts
 * Zod schemas for the project manifest (strepro.yml) and the user config.
 */
import { z } from 'zod';

import { parseConstraint } from '@/runner/packages/constraint';
import { parseSource } from '@/runner/packages/spec';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const refineWith =
  (check: (s: string) => unknown) =>
  (s: string, ctx: z.RefinementCtx): void => {
    try {
      check(s);
    } catch (e) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  };

const sourceString = z.string().min(1).superRefine(refineWith(parseSource));

export const packageSpecSchema = z.union([
  sourceString,
  z
    .object({
      source: sourceString,
      version: z.coerce
        .string()
        .superRefine(refineWith(parseConstraint))
        .optional(),
    })
    .strict(),
]);

const packageMapSchema = z.record(
  z.string().regex(/^[\w.-]+$/, 'invalid package name'),
  packageSpecSchema,
);

export const packagesSchema = z
  .object({
    dependencies: packageMapSchema.optional(),
    dev: packageMapSchema.optional(),
    test: packageMapSchema.optional(),
  })
  .strict();

const refList = z
  .array(z.string().min(1))
  .min(1, { message: 'must list at least one task or script' });

export const taskSchema = z.union([
  z.string().min(1, { message: 'script must be a non-empty string' }),
  refList,
  z.object({ parallel: refList, description: z.string().optional() }).strict(),
  z
    .object({
      script: z.string().min(1, { message: 'script must be a non-empty string' }),
      args: z
        .record(
          z.string().regex(/^\w+$/, 'invalid argument name'),
          z.coerce.string(),
        )
        .optional(),
      description: z.string().optional(),
    })
    .strict(),
]);
export type TaskDef = z.infer<typeof taskSchema>;

export const manifestSchema = z
  .object({
    project: z
      .object({
        name: z.string().optional(),
        description: z.string().optional(),
        authors: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    run: z
      .object({
        /** Directory that receives run logs (relative to the project root). */
        logDir: z.string().min(1).optional(),
        jobs: z.coerce.number().int().positive().optional(),
        /** Seconds. */
        timeout: z.coerce.number().positive().optional(),
        allowGlobal: coerceBool,
      })
      .strict()
      .optional(),
    packages: packagesSchema.optional(),
    scripts: z
      .object({ tasks: z.record(z.string().min(1), taskSchema).optional() })
      .strict()
      .optional(),
  })
  .strict();
export type Manifest = z.infer<typeof manifestSchema>;

export const userConfigSchema = z
  .object({
    stataBinary: z.string().min(1).optional(),
    cacheDir: z.string().min(1).optional(),
  })
  .strict();
export type UserConfig = z.infer<typeof userConfigSchema>;
