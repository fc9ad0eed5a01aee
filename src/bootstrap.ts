import type { AppConfig } from './config.js';
import { openDatabase } from './db.js';
import type { Db } from './db.js';
import { createMailer } from './integrations/mailer.js';
import { JobDispatcher } from './queue/dispatcher.js';
import { SqliteQueueStore } from './queue/index.js';
import { createJobRegistry } from './queue/jobs/index.js';
import type { JobRegistry } from './queue/registry.js';
import type { Clock } from './queue/types.js';
import { AuditLogService } from './services/audit.service.js';
import { EmailVerificationService } from './services/email-verification.service.js';
import { QueueAdminService } from './services/queue-admin.service.js';
import type { Mailer } from './types.js';

export interface Services {
  db: Db;
  store: SqliteQueueStore;
  registry: JobRegistry;
  dispatcher: JobDispatcher;
  audit: AuditLogService;
  verification: EmailVerificationService;
  queueAdmin: QueueAdminService;
}

export interface ServiceOverrides {
  db?: Db;
  mailer?: Mailer;
  clock?: Clock;
}

// Wires the object graph shared by the API server and the worker process.
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? Date.now;
  const db = overrides.db ?? openDatabase(config.DB_PATH);
  const mailer = overrides.mailer ?? createMailer({ smtpUrl: config.SMTP_URL, from: config.MAIL_FROM });

  const store = new SqliteQueueStore(db, clock);
  const audit = new AuditLogService(db, clock);
  const verification = new EmailVerificationService(
    db,
    mailer,
    { appUrl: config.APP_URL, ttlHours: config.VERIFICATION_TOKEN_TTL_HOURS },
    clock
  );
  const registry = createJobRegistry({ tokens: verification, audit });

  return {
    db,
    store,
    registry,
    dispatcher: new JobDispatcher(store),
    audit,
    verification,
    queueAdmin: new QueueAdminService(store, registry),
  };
}
