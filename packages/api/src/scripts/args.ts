import { z } from 'zod';
import { ValidationError } from '../errors';

export interface IngestArgs {
  dir: string;
  batchSize?: number;
  reportPath?: string;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const flagIndex = argv.findIndex((arg) => arg === flag);
  if (flagIndex >= 0 && argv[flagIndex + 1] && !argv[flagIndex + 1].startsWith('--')) {
    return argv[flagIndex + 1];
  }
  return undefined;
}

const IngestArgsSchema = z.object({
  dir: z.string({ required_error: '--dir is required' }).min(1),
  batchSize: z.coerce.number().int().positive().optional(),
  reportPath: z.string().min(1).optional(),
});

/**
 * `--dir <chunks dir> [--batch-size N] [--report file]`
 */
export function parseIngestArgs(argv: string[]): IngestArgs {
  const result = IngestArgsSchema.safeParse({
    dir: flagValue(argv, '--dir'),
    batchSize: flagValue(argv, '--batch-size'),
    reportPath: flagValue(argv, '--report'),
  });

  if (!result.success) {
    throw new ValidationError(
      'Invalid arguments',
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  return result.data;
}
