import { z } from 'zod';
import { RUNTIMES } from '../workflows/types.js';

/**
 * Validation schema for the options of one `run` invocation.
 *
 * The same schema guards the real command line and every directive payload
 * read from a commit message, so both paths reject the same input.
 */
export const runOptionsSchema = z
  .object({
    action: z.string().min(1).optional(),
    wfile: z.string().min(1).optional(),
    debug: z.boolean(),
    quiet: z.boolean(),
    dryRun: z.boolean(),
    logFile: z.string().min(1).optional(),
    onFailure: z.string().min(1).optional(),
    parallel: z.boolean(),
    reuse: z.boolean(),
    runtime: z.enum(RUNTIMES),
    skip: z.array(z.string().min(1)),
    skipClone: z.boolean(),
    skipPull: z.boolean(),
    withDependencies: z.boolean(),
    workspace: z.string().min(1).optional(),
  })
  .strict();

export type RunOptions = z.infer<typeof runOptionsSchema>;

export type RunOptionName = keyof RunOptions;

/**
 * Formats Zod validation errors into a human-readable message
 */
export function formatZodError(error: z.ZodError): string {
  const errors = error.errors.map((err) => {
    const path = err.path.join('.');
    return `  - ${path}: ${err.message}`;
  });

  return `Validation failed:\n${errors.join('\n')}`;
}
