import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Job } from './job.js';
import type { PushOptions, QueueStore } from './types.js';

// Enqueuing side of the queue: serializes an already-validated job and stores it.
export class JobDispatcher {
  constructor(
    private readonly store: QueueStore,
    private readonly logger: Logger = createLogger('Queue')
  ) {}

  async dispatch(job: Job, options: PushOptions = {}): Promise<string> {
    const delaySeconds = options.delaySeconds ?? 0;
    if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
      throw new ValidationError(`delaySeconds must be a non-negative number, got ${delaySeconds}`);
    }

    const priority = options.priority ?? 'default';
    const id = await this.store.push(
      { name: job.getName(), job: job.serialize() },
      { priority, delaySeconds }
    );

    this.logger.info('Job queued', {
      job_id: id,
      job: job.getName(),
      priority,
      delay: delaySeconds,
    });

    return id;
  }
}
