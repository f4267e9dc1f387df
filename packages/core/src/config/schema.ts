import { z } from 'zod';

const PathSchema = z.string().min(1, 'Path must not be empty');

export const CopyTaskSchema = z
  .object({
    type: z.literal('copy'),
    source: PathSchema,
    destination: PathSchema,
    ignoreFile: PathSchema.optional(),
    useIgnoreFile: z.boolean().optional(),
  })
  .strict();

export const ReplaceTaskSchema = z
  .object({
    type: z.literal('replace'),
    target: PathSchema,
    pattern: z.string(),
    replacement: z.string(),
    encoding: z.enum(['utf-8', 'utf-16le']).optional(),
    flags: z.string().regex(/^[imsu]*$/, 'Only the i, m, s and u flags are supported').optional(),
  })
  .strict();

export const RunTaskSchema = z
  .object({
    type: z.literal('run'),
    command: z.string().min(1, 'Command must not be empty'),
    args: z.array(z.string()).optional(),
  })
  .strict();

export const TaskSchema = z.discriminatedUnion('type', [CopyTaskSchema, ReplaceTaskSchema, RunTaskSchema]);

/**
 * Configuration document schema
 */
export const PackagerConfigSchema = z
  .object({
    tasks: z.array(TaskSchema),
  })
  .strict();
