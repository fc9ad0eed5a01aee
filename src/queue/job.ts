import { z } from 'zod';
import { ExecutionError, ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { JobOptions, JobOutcome, JobPayload, SerializedJob } from './types.js';

export interface JobDefaults {
  maxAttempts: number;
  retryDelay: number;
}

const jobOptionsSchema = z.object({
  attempts: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
  retryDelay: z.number().int().min(0),
  createdAt: z.string().datetime(),
});

function toIssues(error: z.ZodError) {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parses a job payload against its schema. Throws ValidationError so that a
 * malformed job never reaches the queue.
 */
export function validatePayload<P extends JobPayload>(
  jobName: string,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  payload: unknown
): P {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ValidationError(
      `${jobName} payload is invalid: ${issues.map(i => `${i.path || '(root)'} ${i.message}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}

export const succeeded = (): JobOutcome => ({ ok: true });

export const transientFailure = (error: ExecutionError): JobOutcome =>
  ({ ok: false, kind: 'transient', error });

export const terminalFailure = (error: ExecutionError): JobOutcome =>
  ({ ok: false, kind: 'terminal', error });

export abstract class Job<P extends JobPayload = JobPayload> {
  protected readonly payload: P;
  protected attempts: number;
  protected readonly maxAttempts: number;
  protected readonly retryDelay: number;
  protected readonly createdAt: string;
  protected readonly logger: Logger;

  protected constructor(
    private readonly name: string,
    payload: P,
    options: JobOptions,
    defaults: JobDefaults,
    logger: Logger = createLogger('Job')
  ) {
    const parsed = jobOptionsSchema.safeParse({
      attempts: options.attempts ?? 0,
      maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
      retryDelay: options.retryDelay ?? defaults.retryDelay,
      createdAt: options.createdAt ?? new Date().toISOString(),
    });
    if (!parsed.success) {
      throw new ValidationError(`${name} options are invalid`, toIssues(parsed.error));
    }

    this.payload = payload;
    this.attempts = parsed.data.attempts;
    this.maxAttempts = parsed.data.maxAttempts;
    this.retryDelay = parsed.data.retryDelay;
    this.createdAt = parsed.data.createdAt;
    this.logger = logger;
  }

  /**
   * Does the work. Failures are reported through the returned outcome; a
   * thrown error is treated by the worker as a transient ExecutionError.
   */
  abstract handle(): Promise<JobOutcome>;

  // Runs once, after the last attempt. Subclasses extend it for side effects.
  failed(error: Error): void | Promise<void> {
    this.logger.error('Job failed permanently', {
      job: this.name,
      payload: this.payload,
      attempts: this.attempts,
      error: error.message,
    });
  }

  getName(): string {
    return this.name;
  }

  getPayload(): P {
    return this.payload;
  }

  getAttempts(): number {
    return this.attempts;
  }

  setAttempts(attempts: number): void {
    if (!Number.isInteger(attempts) || attempts < 0) {
      throw new ValidationError(`attempts must be a non-negative integer, got ${attempts}`);
    }
    this.attempts = attempts;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  getRetryDelay(): number {
    return this.retryDelay;
  }

  getCreatedAt(): string {
    return this.createdAt;
  }

  serialize(): string {
    const envelope: SerializedJob = {
      name: this.name,
      payload: this.payload,
      attempts: this.attempts,
      max_attempts: this.maxAttempts,
      retry_delay: this.retryDelay,
      created_at: this.createdAt,
    };
    return JSON.stringify(envelope);
  }
}
