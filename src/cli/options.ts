/* src/cli/options.ts
 * Zod schemas for subcommand options (Commander hands over loose objects).
 */
import { z } from 'zod';

export const outputFormats = ['json', 'yaml', 'ini', 'kv'] as const;

export const formatSchema = z.enum(outputFormats);
export type OutputFormat = z.infer<typeof formatSchema>;

const encoding = z.string().trim().min(1).optional();

export const parseOptionsSchema = z
  .object({
    encoding,
    format: formatSchema.default('json'),
    set: z.array(z.string()).default([]),
    out: z.string().trim().min(1).optional(),
  })
  .strict();
export type ParseOptions = z.infer<typeof parseOptionsSchema>;

export const getOptionsSchema = z
  .object({
    encoding,
    set: z.array(z.string()).default([]),
    default: z.string().optional(),
  })
  .strict();
export type GetOptions = z.infer<typeof getOptionsSchema>;

export const checkOptionsSchema = z.object({ encoding }).strict();
export type CheckOptions = z.infer<typeof checkOptionsSchema>;
