import { generateUUID } from '../db.js';
import type { Db } from '../db.js';
import type { Job } from './job.js';
import type {
  Clock,
  JobPriority,
  NewRecord,
  PushOptions,
  QueueRecord,
  QueueStats,
  QueueStore,
  RecordStatus,
  StoredRecord,
} from './types.js';

interface JobRow {
  id: string;
  name: string;
  job: string;
  priority: JobPriority;
  status: RecordStatus;
  attempts: number;
  last_error: string | null;
  available_at: string;
  locked_until: string | null;
  created_at: string;
  updated_at: string;
}

const PRIORITY_RANK_SQL = `CASE priority WHEN 'high' THEN 0 WHEN 'default' THEN 1 ELSE 2 END`;

function toStoredRecord(row: JobRow): StoredRecord {
  return {
    id: row.id,
    name: row.name,
    job: row.job,
    priority: row.priority,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    availableAt: row.available_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// Reads the attempt counter out of a serialized job without trusting it.
function attemptsOf(serializedJob: string): number | null {
  try {
    const parsed: unknown = JSON.parse(serializedJob);
    if (parsed !== null && typeof parsed === 'object' && 'attempts' in parsed) {
      const { attempts } = parsed;
      return typeof attempts === 'number' && Number.isInteger(attempts) ? attempts : null;
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Queue store backed by the `job_queue` table. Timestamps are ISO-8601 strings,
 * which SQLite compares correctly as text.
 */
export class SqliteQueueStore implements QueueStore {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock = Date.now
  ) {}

  private isoIn(seconds = 0): string {
    return new Date(this.clock() + seconds * 1000).toISOString();
  }

  async push(record: NewRecord, options: PushOptions = {}): Promise<string> {
    const id = generateUUID();
    const now = this.isoIn();

    this.db.prepare(`
      INSERT INTO job_queue
        (id, name, job, priority, status, attempts, available_at, created_at, updated_at)
      VALUES (?, ?, ?, ?, 'pending', ?, ?, ?, ?)
    `).run(
      id,
      record.name,
      record.job,
      options.priority ?? 'default',
      attemptsOf(record.job) ?? 0,
      this.isoIn(options.delaySeconds ?? 0),
      now,
      now
    );

    return id;
  }

  // Claims the next eligible record in one UPDATE...RETURNING statement, so two
  // connections to the same file can never claim the same row. A record still
  // 'processing' after its lock expired is eligible again (its worker died).
  async pop(timeoutSeconds: number): Promise<QueueRecord | null> {
    const now = this.isoIn();
    const row = this.db.prepare(`
      UPDATE job_queue
      SET status = 'processing', locked_until = @lockedUntil, updated_at = @now
      WHERE id = (
        SELECT id FROM job_queue
        WHERE (status = 'pending' AND available_at <= @now)
           OR (status = 'processing' AND locked_until IS NOT NULL AND locked_until <= @now)
        ORDER BY ${PRIORITY_RANK_SQL}, available_at ASC, rowid ASC
        LIMIT 1
      )
      RETURNING id, job
    `).get({
      now,
      lockedUntil: this.isoIn(timeoutSeconds),
    }) as Pick<JobRow, 'id' | 'job'> | undefined;

    return row ? { id: row.id, job: row.job } : null;
  }

  async complete(id: string): Promise<void> {
    this.db.prepare(`
      UPDATE job_queue
      SET status = 'completed', locked_until = NULL, updated_at = ?
      WHERE id = ? AND status IN ('pending', 'processing')
    `).run(this.isoIn(), id);
  }

  async retry(id: string, job: Job, delaySeconds: number, reason?: string): Promise<void> {
    this.db.prepare(`
      UPDATE job_queue
      SET status = 'pending', job = ?, attempts = ?, last_error = ?,
          available_at = ?, locked_until = NULL, updated_at = ?
      WHERE id = ?
    `).run(
      job.serialize(),
      job.getAttempts(),
      reason ?? null,
      this.isoIn(delaySeconds),
      this.isoIn(),
      id
    );
  }

  async fail(id: string, serializedJob: string, reason: string): Promise<void> {
    const attempts = attemptsOf(serializedJob);
    this.db.prepare(`
      UPDATE job_queue
      SET status = 'failed', job = ?, attempts = COALESCE(?, attempts), last_error = ?,
          locked_until = NULL, updated_at = ?
      WHERE id = ?
    `).run(serializedJob, attempts, reason, this.isoIn(), id);
  }

  get(id: string): StoredRecord | null {
    const row = this.db.prepare('SELECT * FROM job_queue WHERE id = ?').get(id) as JobRow | undefined;
    return row ? toStoredRecord(row) : null;
  }

  listFailed(limit = 50): StoredRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM job_queue
      WHERE status = 'failed'
      ORDER BY updated_at DESC, rowid DESC
      LIMIT ?
    `).all(limit) as JobRow[];

    return rows.map(toStoredRecord);
  }

  discard(id: string): boolean {
    const result = this.db.prepare(
      "DELETE FROM job_queue WHERE id = ? AND status = 'failed'"
    ).run(id);
    return result.changes > 0;
  }

  stats(): QueueStats {
    const byStatus = this.db.prepare(`
      SELECT status, COUNT(*) as count FROM job_queue GROUP BY status
    `).all() as Array<{ status: RecordStatus; count: number }>;

    const byPriority = this.db.prepare(`
      SELECT priority, COUNT(*) as count FROM job_queue
      WHERE status = 'pending'
      GROUP BY priority
    `).all() as Array<{ priority: JobPriority; count: number }>;

    const delayed = this.db.prepare(`
      SELECT COUNT(*) as count FROM job_queue
      WHERE status = 'pending' AND available_at > ?
    `).get(this.isoIn()) as { count: number };

    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      delayed: delayed.count,
      byPriority: { high: 0, default: 0, low: 0 },
    };
    for (const row of byStatus) stats[row.status] = row.count;
    for (const row of byPriority) stats.byPriority[row.priority] = row.count;

    return stats;
  }
}
