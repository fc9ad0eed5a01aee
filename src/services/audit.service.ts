import { generateUUID } from '../db.js';
import type { Db } from '../db.js';
import { createLogger, maskContext } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Clock } from '../queue/types.js';
import type { AuditEntry, AuditSink } from '../types.js';

interface AuditRow {
  id: string;
  action: string;
  context: string;
  created_at: string;
}

function parseContext(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : { value: parsed };
}

// Operator-facing trail of events that need a human, kept in `audit_log`.
export class AuditLogService implements AuditSink {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock = Date.now,
    private readonly logger: Logger = createLogger('Audit')
  ) {}

  record(action: string, context: Record<string, unknown>): void {
    const masked = maskContext(context);

    this.db.prepare(`
      INSERT INTO audit_log (id, action, context, created_at)
      VALUES (?, ?, ?, ?)
    `).run(generateUUID(), action, JSON.stringify(masked), new Date(this.clock()).toISOString());

    this.logger.warn(action, context);
  }

  recent(limit = 50): AuditEntry[] {
    const rows = this.db.prepare(`
      SELECT * FROM audit_log ORDER BY created_at DESC, rowid DESC LIMIT ?
    `).all(limit) as AuditRow[];

    return rows.map(row => ({
      id: row.id,
      action: row.action,
      context: parseContext(row.context),
      createdAt: row.created_at,
    }));
  }
}
