import { z } from 'zod';
import {
  DeserializationError,
  ExecutionError,
  TerminalFailureHookError,
  ValidationError,
  toError,
} from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { transientFailure } from './job.js';
import type { Job } from './job.js';
import type { JobRegistry } from './registry.js';
import type { Clock, JobFailure, JobOutcome, QueueRecord, QueueStore } from './types.js';

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export type WorkerState = 'idle' | 'running' | 'shutting_down' | 'stopped';

export type StopReason = 'max_jobs' | 'max_time' | 'shutdown';

export type RecordResolution = 'completed' | 'retrying' | 'failed';

export interface WorkerOptions {
  maxJobs?: number;            // 0 = unlimited
  maxTime?: number;            // seconds, 0 = unlimited
  sleep?: number;              // seconds between polls of an empty queue
  visibilityTimeout?: number;  // seconds a popped record stays claimed
}

export interface WorkerDependencies {
  store: QueueStore;
  registry: JobRegistry;
  logger?: Logger;
  clock?: Clock;
  sleeper?: Sleeper;
}

export interface WorkerSummary {
  processedJobs: number;
  runtimeSeconds: number;
  reason: StopReason;
}

const workerOptionsSchema = z.object({
  maxJobs: z.number().int().min(0).default(0),
  maxTime: z.number().int().min(0).default(0),
  sleep: z.number().int().min(0).default(3),
  visibilityTimeout: z.number().int().positive().default(300),
});

// Resolves after `ms`, or as soon as the signal aborts.
export const sleep: Sleeper = (ms, signal) =>
  new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

/**
 * Sequential polling worker. Pops one record at a time, runs it and settles
 * it as completed, retried with the job's delay, or failed. Shutdown is
 * cooperative: a running job is always allowed to finish.
 */
export class Worker {
  private readonly store: QueueStore;
  private readonly registry: JobRegistry;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleeper: Sleeper;

  private readonly maxJobs: number;
  private readonly maxTime: number;
  private readonly sleepSeconds: number;
  private readonly visibilityTimeout: number;

  private state: WorkerState = 'idle';
  private shouldQuit = false;
  private processedJobs = 0;
  private startTime: number;
  private readonly wake = new AbortController();

  constructor(deps: WorkerDependencies, options: WorkerOptions = {}) {
    const parsed = workerOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid worker options',
        parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    this.store = deps.store;
    this.registry = deps.registry;
    this.logger = deps.logger ?? createLogger('Worker');
    this.clock = deps.clock ?? Date.now;
    this.sleeper = deps.sleeper ?? sleep;

    this.maxJobs = parsed.data.maxJobs;
    this.maxTime = parsed.data.maxTime;
    this.sleepSeconds = parsed.data.sleep;
    this.visibilityTimeout = parsed.data.visibilityTimeout;

    this.startTime = this.clock();
  }

  getState(): WorkerState {
    return this.state;
  }

  getProcessedCount(): number {
    return this.processedJobs;
  }

  async run(): Promise<WorkerSummary> {
    if (this.state !== 'idle') {
      throw new Error(`Worker cannot start from state "${this.state}"`);
    }

    this.state = this.shouldQuit ? 'shutting_down' : 'running';
    this.startTime = this.clock();

    this.logger.info('Queue worker started', {
      max_jobs: this.maxJobs || 'unlimited',
      max_time: this.maxTime ? `${this.maxTime}s` : 'unlimited',
      sleep: `${this.sleepSeconds}s`,
    });

    let reason = this.stopReason();
    while (reason === null) {
      let found = false;
      try {
        found = await this.runOnce();
      } catch (error) {
        this.logger.error('Unexpected error while polling the queue', { error: toError(error) });
      }

      if (!found) await this.idle();
      reason = this.stopReason();
    }

    this.state = 'stopped';
    const summary: WorkerSummary = {
      processedJobs: this.processedJobs,
      runtimeSeconds: Math.round(this.elapsedMs() / 10) / 100,
      reason,
    };

    this.logger.info('Queue worker stopped', {
      processed_jobs: summary.processedJobs,
      runtime: `${summary.runtimeSeconds}s`,
      reason,
    });

    return summary;
  }

  /** Pops and settles at most one record. Resolves false when the queue had nothing ready. */
  async runOnce(): Promise<boolean> {
    const record = await this.store.pop(this.visibilityTimeout);
    if (!record) return false;

    await this.process(record);
    return true;
  }

  shutdown(signal?: string): void {
    if (this.shouldQuit) return;

    this.logger.info('Shutdown signal received', signal ? { signal } : undefined);
    this.shouldQuit = true;
    if (this.state === 'running') this.state = 'shutting_down';
    this.wake.abort();
  }

  private async process(record: QueueRecord): Promise<RecordResolution> {
    this.logger.debug('Processing job', { job_id: record.id });

    let job: Job;
    try {
      job = this.registry.deserialize(record.job);
    } catch (error) {
      if (!(error instanceof DeserializationError)) throw error;

      this.logger.error('Failed to deserialize job', { job_id: record.id, error: error.message });
      await this.store.fail(record.id, record.job, `Deserialization failed: ${error.message}`);
      return 'failed';
    }

    const attempt = job.getAttempts() + 1;
    job.setAttempts(attempt);

    this.logger.info('Executing job', {
      job_id: record.id,
      job: job.getName(),
      attempt,
      max_attempts: job.getMaxAttempts(),
    });

    const outcome = await this.execute(job);

    if (outcome.ok) {
      await this.store.complete(record.id);
      this.processedJobs++;
      this.logger.info('Job completed successfully', { job_id: record.id, job: job.getName() });
      return 'completed';
    }

    return this.settleFailure(record.id, job, outcome);
  }

  private async execute(job: Job): Promise<JobOutcome> {
    try {
      return await job.handle();
    } catch (error) {
      const cause = toError(error);
      return transientFailure(new ExecutionError(cause.message, job.getName(), { cause }));
    }
  }

  private async settleFailure(id: string, job: Job, failure: JobFailure): Promise<RecordResolution> {
    const { kind, error } = failure;
    const attempts = job.getAttempts();
    const maxAttempts = job.getMaxAttempts();

    this.logger.warn('Job execution failed', {
      job_id: id,
      job: job.getName(),
      kind,
      attempt: attempts,
      error: error.message,
    });

    // retry() and fail() both clear the claim; if either throws, the record
    // stays 'processing' and is reclaimed once its lock expires.
    if (kind === 'transient' && attempts < maxAttempts) {
      const delay = job.getRetryDelay();
      this.logger.info('Retrying job', {
        job_id: id,
        job: job.getName(),
        attempt: attempts,
        max_attempts: maxAttempts,
        retry_delay: delay,
      });
      await this.store.retry(id, job, delay, error.message);
      return 'retrying';
    }

    this.logger.error(
      kind === 'terminal' ? 'Job failed with a terminal error' : 'Job failed after max retries',
      { job_id: id, job: job.getName(), attempts }
    );

    await this.runFailedHook(id, job, error);
    await this.store.fail(id, job.serialize(), error.message);
    return 'failed';
  }

  // The hook is best effort: a throwing hook must not keep the record from being failed.
  private async runFailedHook(id: string, job: Job, error: ExecutionError): Promise<void> {
    try {
      await job.failed(error);
    } catch (hookError) {
      const wrapped = new TerminalFailureHookError(job.getName(), { cause: toError(hookError) });
      this.logger.error('Job failure hook threw', { job_id: id, error: wrapped.message });
    }
  }

  private async idle(): Promise<void> {
    if (this.shouldQuit) return;

    let ms = this.sleepSeconds * 1000;
    if (this.maxTime > 0) {
      ms = Math.min(ms, Math.max(0, this.maxTime * 1000 - this.elapsedMs()));
    }
    if (ms <= 0) return;

    await this.sleeper(ms, this.wake.signal);
  }

  private stopReason(): StopReason | null {
    if (this.shouldQuit) return 'shutdown';

    if (this.maxJobs > 0 && this.processedJobs >= this.maxJobs) {
      this.logger.info('Max jobs reached, stopping worker');
      return 'max_jobs';
    }

    if (this.maxTime > 0 && this.elapsedMs() >= this.maxTime * 1000) {
      this.logger.info('Max time reached, stopping worker');
      return 'max_time';
    }

    return null;
  }

  private elapsedMs(): number {
    return this.clock() - this.startTime;
  }
}
