import { parseArgs } from 'util';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { ValidationError } from './errors.js';
import type { WorkerOptions } from './queue/worker.js';

const seconds = z.coerce.number().int().min(0);

const argsSchema = z.object({
  'max-jobs': seconds.optional(),
  'max-time': seconds.optional(),
  sleep: seconds.optional(),
  'visibility-timeout': z.coerce.number().int().positive().optional(),
});

export const WORKER_USAGE = `Usage: worker [--max-jobs N] [--max-time SECONDS] [--sleep SECONDS] [--visibility-timeout SECONDS]

  --max-jobs            stop after N successful jobs (0 = unlimited)
  --max-time            stop after this many seconds (0 = unlimited)
  --sleep               seconds to wait when the queue is empty
  --visibility-timeout  seconds a popped job stays claimed`;

/**
 * Resolves worker options from command-line flags, falling back to the
 * WORKER_* environment settings.
 */
export function parseWorkerArgs(argv: string[], config: AppConfig): WorkerOptions {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        'max-jobs': { type: 'string' },
        'max-time': { type: 'string' },
        sleep: { type: 'string' },
        'visibility-timeout': { type: 'string' },
      },
      strict: true,
    }));
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }

  const parsed = argsSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: `--${issue.path.join('.')}`,
      message: issue.message,
    }));
    throw new ValidationError(`Invalid worker arguments: ${issues.map(i => i.path).join(', ')}`, issues);
  }

  return {
    maxJobs: parsed.data['max-jobs'] ?? config.WORKER_MAX_JOBS,
    maxTime: parsed.data['max-time'] ?? config.WORKER_MAX_TIME,
    sleep: parsed.data.sleep ?? config.WORKER_SLEEP,
    visibilityTimeout: parsed.data['visibility-timeout'] ?? config.WORKER_VISIBILITY_TIMEOUT,
  };
}
