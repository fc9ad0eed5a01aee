import { describe, it, expect } from 'vitest';
import { DeserializationError, RegistrationError, ValidationError } from '@/errors.js';
import { JobRegistry } from '@/queue/registry.js';
import { SCRIPTED_JOB, ScriptedJob, createControl, scriptedRegistry } from '../fixtures/jobs.js';

const control = createControl(['ok']);

const envelope = (overrides: Record<string, unknown> = {}) =>
  JSON.stringify({
    name: SCRIPTED_JOB,
    payload: { label: 'stored' },
    attempts: 2,
    max_attempts: 4,
    retry_delay: 30,
    created_at: '2026-01-05T09:00:00.000Z',
    ...overrides,
  });

describe('JobRegistry.register', () => {
  it('lists registered names in order', () => {
    const registry = new JobRegistry()
      .register({ name: 'b.job', create: payload => new ScriptedJob(payload, control) })
      .register({ name: 'a.job', create: payload => new ScriptedJob(payload, control) });

    expect(registry.names()).toEqual(['a.job', 'b.job']);
    expect(registry.has('a.job')).toBe(true);
    expect(registry.has('c.job')).toBe(false);
  });

  it('rejects duplicate names', () => {
    const registry = scriptedRegistry(control);
    expect(() =>
      registry.register({ name: SCRIPTED_JOB, create: payload => new ScriptedJob(payload, control) })
    ).toThrow(new RegistrationError('Job "test.scripted" is already registered'));
  });

  it('rejects names outside the allowed alphabet', () => {
    expect(() =>
      new JobRegistry().register({ name: 'Send Email', create: payload => new ScriptedJob(payload, control) })
    ).toThrow(RegistrationError);
  });
});

describe('JobRegistry.create', () => {
  it('builds a validated job', () => {
    const job = scriptedRegistry(control).create(SCRIPTED_JOB, { label: 'x' }, { maxAttempts: 7 });
    expect(job.getPayload()).toEqual({ label: 'x' });
    expect(job.getMaxAttempts()).toBe(7);
  });

  it('rejects unknown names with a ValidationError', () => {
    expect(() => scriptedRegistry(control).create('ghost', {})).toThrow(
      new ValidationError('Unknown job "ghost"')
    );
  });

  it('rejects a factory that builds a differently named job', () => {
    const registry = new JobRegistry().register({
      name: 'other.job',
      create: payload => new ScriptedJob(payload, control),
    });
    expect(() => registry.create('other.job', { label: 'x' })).toThrow(
      'Factory registered as "other.job" produced a job named "test.scripted"'
    );
  });
});

describe('JobRegistry.deserialize', () => {
  const registry = scriptedRegistry(control);

  it('restores a serialized job with its counters', () => {
    const job = registry.deserialize(envelope());

    expect(job.getName()).toBe(SCRIPTED_JOB);
    expect(job.getPayload()).toEqual({ label: 'stored' });
    expect(job.getAttempts()).toBe(2);
    expect(job.getMaxAttempts()).toBe(4);
    expect(job.getRetryDelay()).toBe(30);
    expect(job.getCreatedAt()).toBe('2026-01-05T09:00:00.000Z');
    expect(job.serialize()).toBe(envelope());
  });

  it('round-trips a freshly created job', () => {
    const job = registry.create(SCRIPTED_JOB, { label: 'fresh' });
    expect(registry.deserialize(job.serialize()).serialize()).toBe(job.serialize());
  });

  it('rejects data that is not JSON', () => {
    expect(() => registry.deserialize('{oops')).toThrow(
      new DeserializationError('Job data is not valid JSON')
    );
  });

  it('names the malformed envelope fields', () => {
    expect(() => registry.deserialize(envelope({ attempts: -1, max_attempts: 'three' }))).toThrow(
      'Job envelope is malformed: attempts, max_attempts'
    );
    expect(() => registry.deserialize('[]')).toThrow('Job envelope is malformed: (root)');
  });

  it('rejects unknown job names', () => {
    expect(() => registry.deserialize(envelope({ name: 'ghost' }))).toThrow(
      new DeserializationError('Unknown job "ghost"')
    );
  });

  it('wraps any error a factory throws while rebuilding a stored job', () => {
    const broken = new JobRegistry().register({
      name: SCRIPTED_JOB,
      create: () => {
        throw new TypeError('cannot read properties of undefined');
      },
    });

    expect(() => broken.deserialize(envelope())).toThrow(
      new DeserializationError(
        'Stored job "test.scripted" is invalid: cannot read properties of undefined'
      )
    );
    expect(() => broken.deserialize(envelope())).toThrow(DeserializationError);
  });

  it('wraps a stored payload that no longer validates', () => {
    expect(() => registry.deserialize(envelope({ payload: { label: '' } }))).toThrow(
      /^Stored job "test\.scripted" is invalid: test\.scripted payload is invalid: label /
    );
  });
});
