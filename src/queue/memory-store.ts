import { randomUUID } from 'crypto';
import type { Job } from './job.js';
import type {
  Clock,
  JobPriority,
  NewRecord,
  PushOptions,
  QueueRecord,
  QueueStore,
  RecordStatus,
  StoredRecord,
} from './types.js';

interface MemoryRecord {
  id: string;
  name: string;
  job: string;
  priority: JobPriority;
  status: RecordStatus;
  attempts: number;
  lastError: string | null;
  availableAt: number;
  lockedUntil: number | null;
  createdAt: number;
  updatedAt: number;
  seq: number;
}

const PRIORITY_RANK: Record<JobPriority, number> = { high: 0, default: 1, low: 2 };

/**
 * In-process queue store. `pop` inspects and claims a record without yielding
 * to the event loop, which is what makes concurrent callers exclusive.
 */
export class MemoryQueueStore implements QueueStore {
  private readonly records = new Map<string, MemoryRecord>();
  private seq = 0;

  constructor(private readonly clock: Clock = Date.now) {}

  async push(record: NewRecord, options: PushOptions = {}): Promise<string> {
    const id = randomUUID();
    const now = this.clock();

    this.records.set(id, {
      id,
      name: record.name,
      job: record.job,
      priority: options.priority ?? 'default',
      status: 'pending',
      attempts: 0,
      lastError: null,
      availableAt: now + (options.delaySeconds ?? 0) * 1000,
      lockedUntil: null,
      createdAt: now,
      updatedAt: now,
      seq: this.seq++,
    });

    return id;
  }

  async pop(timeoutSeconds: number): Promise<QueueRecord | null> {
    const now = this.clock();
    let next: MemoryRecord | undefined;

    for (const record of this.records.values()) {
      const eligible =
        (record.status === 'pending' && record.availableAt <= now) ||
        (record.status === 'processing' && record.lockedUntil !== null && record.lockedUntil <= now);
      if (!eligible) continue;

      if (!next || this.comesBefore(record, next)) next = record;
    }

    if (!next) return null;

    next.status = 'processing';
    next.lockedUntil = now + timeoutSeconds * 1000;
    next.updatedAt = now;
    return { id: next.id, job: next.job };
  }

  async complete(id: string): Promise<void> {
    const record = this.records.get(id);
    if (!record || (record.status !== 'pending' && record.status !== 'processing')) return;

    record.status = 'completed';
    record.lockedUntil = null;
    record.updatedAt = this.clock();
  }

  async retry(id: string, job: Job, delaySeconds: number, reason?: string): Promise<void> {
    const record = this.records.get(id);
    if (!record) return;

    const now = this.clock();
    record.status = 'pending';
    record.job = job.serialize();
    record.attempts = job.getAttempts();
    record.lastError = reason ?? null;
    record.availableAt = now + delaySeconds * 1000;
    record.lockedUntil = null;
    record.updatedAt = now;
  }

  async fail(id: string, serializedJob: string, reason: string): Promise<void> {
    const record = this.records.get(id);
    if (!record) return;

    record.status = 'failed';
    record.job = serializedJob;
    record.lastError = reason;
    record.lockedUntil = null;
    record.updatedAt = this.clock();
  }

  get(id: string): StoredRecord | null {
    const record = this.records.get(id);
    return record ? this.toStoredRecord(record) : null;
  }

  list(status?: RecordStatus): StoredRecord[] {
    return [...this.records.values()]
      .filter(record => status === undefined || record.status === status)
      .sort((a, b) => a.seq - b.seq)
      .map(record => this.toStoredRecord(record));
  }

  private comesBefore(a: MemoryRecord, b: MemoryRecord): boolean {
    const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
    if (rank !== 0) return rank < 0;
    if (a.availableAt !== b.availableAt) return a.availableAt < b.availableAt;
    return a.seq < b.seq;
  }

  private toStoredRecord(record: MemoryRecord): StoredRecord {
    return {
      id: record.id,
      name: record.name,
      job: record.job,
      priority: record.priority,
      status: record.status,
      attempts: record.attempts,
      lastError: record.lastError,
      availableAt: new Date(record.availableAt).toISOString(),
      createdAt: new Date(record.createdAt).toISOString(),
      updatedAt: new Date(record.updatedAt).toISOString(),
    };
  }
}
