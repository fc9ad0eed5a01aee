import { z } from 'zod';
import { DeserializationError, RegistrationError, ValidationError, toError } from '../errors.js';
import type { Job } from './job.js';
import type { JobOptions } from './types.js';

export type JobFactory = (payload: unknown, options: JobOptions) => Job;

export interface JobDefinition {
  name: string;
  create: JobFactory;
}

const JOB_NAME_PATTERN = /^[a-z][a-z0-9_.:-]*$/;

const envelopeSchema = z.object({
  name: z.string().min(1),
  payload: z.record(z.unknown()),
  attempts: z.number().int().min(0),
  max_attempts: z.number().int().min(1),
  retry_delay: z.number().int().min(0),
  created_at: z.string(),
});

/**
 * Maps job names to factories. Stored records are turned back into jobs by
 * looking their name up here, so every job type a worker may meet has to be
 * registered before the worker starts.
 */
export class JobRegistry {
  private readonly factories = new Map<string, JobFactory>();

  register(definition: JobDefinition): this {
    const { name, create } = definition;

    if (!JOB_NAME_PATTERN.test(name)) {
      throw new RegistrationError(
        `Invalid job name "${name}": use lowercase letters, digits, '_', '.', ':' or '-'`
      );
    }
    if (this.factories.has(name)) {
      throw new RegistrationError(`Job "${name}" is already registered`);
    }

    this.factories.set(name, create);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  // Used by enqueuing callers; payload problems surface as ValidationError.
  create(name: string, payload: unknown, options: JobOptions = {}): Job {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ValidationError(`Unknown job "${name}"`);
    }
    return this.build(name, factory, payload, options);
  }

  deserialize(data: string): Job {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new DeserializationError('Job data is not valid JSON', { cause: error });
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      const fields = envelope.error.issues.map(issue => issue.path.join('.') || '(root)');
      throw new DeserializationError(`Job envelope is malformed: ${[...new Set(fields)].join(', ')}`);
    }

    const { name, payload, attempts, max_attempts, retry_delay, created_at } = envelope.data;
    const factory = this.factories.get(name);
    if (!factory) {
      throw new DeserializationError(`Unknown job "${name}"`);
    }

    try {
      return this.build(name, factory, payload, {
        attempts,
        maxAttempts: max_attempts,
        retryDelay: retry_delay,
        createdAt: created_at,
      });
    } catch (error) {
      // Whatever the factory throws, this record can never be rebuilt.
      const cause = toError(error);
      throw new DeserializationError(`Stored job "${name}" is invalid: ${cause.message}`, { cause });
    }
  }

  private build(name: string, factory: JobFactory, payload: unknown, options: JobOptions): Job {
    const job = factory(payload, options);
    if (job.getName() !== name) {
      throw new RegistrationError(
        `Factory registered as "${name}" produced a job named "${job.getName()}"`
      );
    }
    return job;
  }
}
