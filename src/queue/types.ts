import type { ExecutionError } from '../errors.js';
import type { Job } from './job.js';

// Payloads must survive JSON.stringify/JSON.parse unchanged.
export type JobPayload = Record<string, unknown>;

export type JobPriority = 'high' | 'default' | 'low';

export type RecordStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type Clock = () => number;

/** Wire form of a job, as stored in a queue record. */
export interface SerializedJob {
  name: string;
  payload: JobPayload;
  attempts: number;
  max_attempts: number;
  retry_delay: number;
  created_at: string;
}

export interface JobOptions {
  attempts?: number;
  maxAttempts?: number;
  retryDelay?: number;       // seconds
  createdAt?: string;
}

export type FailureKind = 'transient' | 'terminal';

export type JobOutcome =
  | { ok: true }
  | { ok: false; kind: FailureKind; error: ExecutionError };

export type JobFailure = Extract<JobOutcome, { ok: false }>;

/** A claimed record handed to a worker by `pop`. */
export interface QueueRecord {
  id: string;
  job: string;               // serialized job, possibly corrupt
}

export interface NewRecord {
  name: string;
  job: string;
}

export interface PushOptions {
  priority?: JobPriority;
  delaySeconds?: number;
}

export interface StoredRecord {
  id: string;
  name: string;
  job: string;
  priority: JobPriority;
  status: RecordStatus;
  attempts: number;
  lastError: string | null;
  availableAt: string;
  createdAt: string;
  updatedAt: string;
}

export interface QueueStats {
  pending: number;
  processing: number;
  completed: number;
  failed: number;
  delayed: number;           // pending but not yet available
  byPriority: Record<JobPriority, number>;
}

/**
 * Durable home of job records. `pop` must hand a record to at most one
 * caller until that caller completes, retries or fails it (or its
 * visibility lock runs out).
 */
export interface QueueStore {
  push(record: NewRecord, options?: PushOptions): Promise<string>;
  pop(timeoutSeconds: number): Promise<QueueRecord | null>;
  complete(id: string): Promise<void>;
  retry(id: string, job: Job, delaySeconds: number, reason?: string): Promise<void>;
  fail(id: string, serializedJob: string, reason: string): Promise<void>;
}
