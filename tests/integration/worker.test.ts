import { describe, it, expect, afterEach } from 'vitest';
import { SEND_VERIFICATION_EMAIL } from '@/queue/jobs/index.js';
import { Worker } from '@/queue/worker.js';
import { createTestContext } from '../fixtures/app.js';
import { silentLogger } from '../fixtures/jobs.js';

let ctx: ReturnType<typeof createTestContext>;

afterEach(() => {
  ctx.services.db.close();
});

function setup() {
  ctx = createTestContext();
  const { services, time } = ctx;
  const worker = new Worker(
    {
      store: services.store,
      registry: services.registry,
      logger: silentLogger,
      clock: time.clock,
      sleeper: time.sleeper,
    },
    { sleep: 1 }
  );
  return { ...ctx, worker };
}

const enqueue = (services: ReturnType<typeof createTestContext>['services'], email = 'ada@example.test') =>
  services.dispatcher.dispatch(
    services.registry.create(SEND_VERIFICATION_EMAIL, { user_id: 'user-1', email })
  );

describe('verification email delivery through the queue', () => {
  it('sends the email and completes the record', async () => {
    const { services, worker, mailer } = setup();
    const id = await enqueue(services);

    expect(await worker.runOnce()).toBe(true);

    expect(services.store.get(id)?.status).toBe('completed');
    expect(mailer.sent.map(message => message.to)).toEqual(['ada@example.test']);

    const token = /token=([0-9a-f]{64})/.exec(mailer.sent[0]?.text ?? '')?.[1] ?? '';
    expect(services.verification.verifyToken(token)).toMatchObject({ outcome: 'verified', userId: 'user-1' });
  });

  it('retries a mail outage and succeeds once the server is back', async () => {
    const { services, worker, mailer, time } = setup();
    const id = await enqueue(services);
    mailer.failWith = new Error('SMTP connection refused');

    await worker.runOnce();
    expect(services.store.get(id)).toMatchObject({
      status: 'pending',
      attempts: 1,
      lastError: 'SMTP connection refused',
      availableAt: new Date(time.clock() + 120_000).toISOString(),
    });

    mailer.failWith = null;
    time.advance(120_000);
    await worker.runOnce();

    expect(services.store.get(id)?.status).toBe('completed');
    expect(mailer.sent).toHaveLength(1);
  });

  it('fails the record and leaves an audit entry after three outages', async () => {
    const { services, worker, mailer, time } = setup();
    const id = await enqueue(services);
    mailer.failWith = new Error('SMTP connection refused');

    for (let attempt = 0; attempt < 3; attempt++) {
      await worker.runOnce();
      time.advance(120_000);
    }

    expect(services.store.get(id)).toMatchObject({
      status: 'failed',
      attempts: 3,
      lastError: 'SMTP connection refused',
    });
    expect(await worker.runOnce()).toBe(false);

    const entries = services.audit.recent();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      action: 'verification_email.failed',
      context: {
        user_id: 'user-1',
        email: 'ada@example.test',
        attempts: 3,
        error: 'SMTP connection refused',
        action_required: 'Manual email verification or resend needed',
      },
    });
  });

  it('runs until maxJobs and reports the summary', async () => {
    const { services, time } = setup();
    const worker = new Worker(
      { store: services.store, registry: services.registry, logger: silentLogger, clock: time.clock, sleeper: time.sleeper },
      { maxJobs: 2 }
    );
    await enqueue(services, 'a@example.test');
    await enqueue(services, 'b@example.test');
    await enqueue(services, 'c@example.test');

    const summary = await worker.run();

    expect(summary).toEqual({ processedJobs: 2, runtimeSeconds: 0, reason: 'max_jobs' });
    expect(services.store.stats()).toMatchObject({ pending: 1, completed: 2 });
  });
});
