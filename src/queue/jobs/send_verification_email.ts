import { z } from 'zod';
import { ExecutionError, ValidationError, toError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type { AuditSink, TokenIssuer } from '../../types.js';
import { Job, succeeded, terminalFailure, transientFailure, validatePayload } from '../job.js';
import type { JobDefinition } from '../registry.js';
import type { JobOptions, JobOutcome } from '../types.js';

export const SEND_VERIFICATION_EMAIL = 'send_verification_email';

export const sendVerificationEmailSchema = z.object({
  user_id: z.string().min(1, 'user_id is required'),
  email: z.string().email('email must be a valid address'),
  ip_address: z.string().nullable().optional(),
});

export type SendVerificationEmailPayload = z.infer<typeof sendVerificationEmailSchema>;

export interface SendVerificationEmailDeps {
  tokens: TokenIssuer;
  audit: AuditSink;
  logger?: Logger;
}

// Sent after registration so the HTTP request does not wait on the mail server.
export class SendVerificationEmailJob extends Job<SendVerificationEmailPayload> {
  constructor(
    payload: unknown,
    private readonly deps: SendVerificationEmailDeps,
    options: JobOptions = {}
  ) {
    super(
      SEND_VERIFICATION_EMAIL,
      validatePayload(SEND_VERIFICATION_EMAIL, sendVerificationEmailSchema, payload),
      options,
      { maxAttempts: 3, retryDelay: 120 },
      deps.logger
    );
  }

  async handle(): Promise<JobOutcome> {
    const { user_id: userId, email, ip_address: ipAddress } = this.payload;

    this.logger.info('Processing SendVerificationEmailJob', {
      user_id: userId,
      email,
      attempt: this.attempts,
    });

    try {
      await this.deps.tokens.createToken(userId, email, { ipAddress: ipAddress ?? null });
    } catch (error) {
      const cause = toError(error);
      this.logger.error('SendVerificationEmailJob failed', {
        user_id: userId,
        email,
        attempt: this.attempts,
        error: cause.message,
      });

      const failure = new ExecutionError(cause.message, this.getName(), { cause });
      return cause instanceof ValidationError ? terminalFailure(failure) : transientFailure(failure);
    }

    this.logger.info('Verification email sent successfully via job', { user_id: userId, email });
    return succeeded();
  }

  async failed(error: Error): Promise<void> {
    await super.failed(error);

    this.deps.audit.record('verification_email.failed', {
      user_id: this.payload.user_id,
      email: this.payload.email,
      attempts: this.attempts,
      error: error.message,
      action_required: 'Manual email verification or resend needed',
    });
  }
}

export function sendVerificationEmailJob(deps: SendVerificationEmailDeps): JobDefinition {
  return {
    name: SEND_VERIFICATION_EMAIL,
    create: (payload, options) => new SendVerificationEmailJob(payload, deps, options),
  };
}
