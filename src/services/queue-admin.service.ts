import { DeserializationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { SqliteQueueStore } from '../queue/index.js';
import type { Job } from '../queue/job.js';
import type { JobRegistry } from '../queue/registry.js';
import type { QueueStats, StoredRecord } from '../queue/types.js';

export type RequeueResult =
  | { outcome: 'not_found' | 'not_failed' | 'corrupt'; message: string }
  | { outcome: 'requeued'; id: string };

export interface FailedJobView {
  id: string;
  name: string;
  priority: string;
  attempts: number;
  error: string | null;
  failed_at: string;
  job: string;
}

const toFailedJobView = (record: StoredRecord): FailedJobView => ({
  id: record.id,
  name: record.name,
  priority: record.priority,
  attempts: record.attempts,
  error: record.lastError,
  failed_at: record.updatedAt,
  job: record.job,
});

// Manual remediation of terminal records. Nothing here runs automatically.
export class QueueAdminService {
  constructor(
    private readonly store: SqliteQueueStore,
    private readonly registry: JobRegistry,
    private readonly logger: Logger = createLogger('QueueAdmin')
  ) {}

  stats(): QueueStats {
    return this.store.stats();
  }

  listFailed(limit = 50): FailedJobView[] {
    return this.store.listFailed(limit).map(toFailedJobView);
  }

  // Puts a failed record back in line with a fresh attempt budget.
  async requeue(id: string): Promise<RequeueResult> {
    const record = this.store.get(id);
    if (!record) {
      return { outcome: 'not_found', message: 'Job not found' };
    }
    if (record.status !== 'failed') {
      return { outcome: 'not_failed', message: `Job is ${record.status}, only failed jobs can be retried` };
    }

    let job: Job;
    try {
      job = this.registry.deserialize(record.job);
    } catch (error) {
      if (error instanceof DeserializationError) {
        return { outcome: 'corrupt', message: error.message };
      }
      throw error;
    }

    job.setAttempts(0);
    await this.store.retry(id, job, 0);
    this.logger.info('Failed job requeued manually', { job_id: id, job: job.getName() });

    return { outcome: 'requeued', id };
  }

  discard(id: string): boolean {
    const removed = this.store.discard(id);
    if (removed) this.logger.info('Failed job discarded', { job_id: id });
    return removed;
  }
}
