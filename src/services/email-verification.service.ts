import { createHash, randomBytes } from 'crypto';
import { generateUUID } from '../db.js';
import type { Db } from '../db.js';
import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Clock } from '../queue/types.js';
import type { Mailer, TokenContext, TokenIssuer } from '../types.js';

export interface EmailVerificationOptions {
  appUrl: string;
  ttlHours: number;
}

interface VerificationRow {
  id: string;
  user_id: string;
  email: string;
  token_hash: string;
  ip_address: string | null;
  expires_at: string;
  verified_at: string | null;
  created_at: string;
}

export type VerifyTokenResult =
  | { outcome: 'invalid' | 'expired' | 'already_verified'; message: string }
  | { outcome: 'verified'; userId: string; email: string };

const hashToken = (token: string): string =>
  createHash('sha256').update(token).digest('hex');

// Only the SHA-256 of a token is stored; the raw token exists in the email alone.
export class EmailVerificationService implements TokenIssuer {
  constructor(
    private readonly db: Db,
    private readonly mailer: Mailer,
    private readonly options: EmailVerificationOptions,
    private readonly clock: Clock = Date.now,
    private readonly logger: Logger = createLogger('EmailVerification')
  ) {}

  async createToken(userId: string, email: string, context: TokenContext = {}): Promise<string> {
    if (!userId.trim() || !email.trim()) {
      throw new ValidationError('userId and email are required to issue a verification token');
    }

    const token = randomBytes(32).toString('hex');
    const id = generateUUID();
    const now = this.clock();
    const expiresAt = new Date(now + this.options.ttlHours * 3600 * 1000).toISOString();

    this.db.prepare(`
      INSERT INTO email_verifications
        (id, user_id, email, token_hash, ip_address, expires_at, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(id, userId, email, hashToken(token), context.ipAddress ?? null, expiresAt, new Date(now).toISOString());

    try {
      await this.mailer.send(this.buildMessage(email, token));
    } catch (error) {
      // An undelivered token is useless; drop it so a retry starts clean.
      this.db.prepare('DELETE FROM email_verifications WHERE id = ?').run(id);
      throw error;
    }

    this.logger.info('Email verification token created', {
      user_id: userId,
      email,
      expires_at: expiresAt,
    });

    return token;
  }

  verifyToken(token: string): VerifyTokenResult {
    return this.db.transaction((): VerifyTokenResult => {
      const row = this.db
        .prepare('SELECT * FROM email_verifications WHERE token_hash = ?')
        .get(hashToken(token)) as VerificationRow | undefined;

      if (!row) {
        this.logger.warn('Invalid email verification attempt');
        return { outcome: 'invalid', message: 'Invalid verification token' };
      }

      if (row.verified_at) {
        return { outcome: 'already_verified', message: 'Email has already been verified' };
      }

      const now = new Date(this.clock()).toISOString();
      if (row.expires_at <= now) {
        return { outcome: 'expired', message: 'Verification token has expired' };
      }

      this.db.prepare('UPDATE email_verifications SET verified_at = ? WHERE id = ?').run(now, row.id);
      this.logger.info('Email successfully verified', { user_id: row.user_id, email: row.email });

      return { outcome: 'verified', userId: row.user_id, email: row.email };
    })();
  }

  isEmailVerified(userId: string): boolean {
    const row = this.db.prepare(`
      SELECT 1 FROM email_verifications WHERE user_id = ? AND verified_at IS NOT NULL LIMIT 1
    `).get(userId);
    return row !== undefined;
  }

  // Maintenance: removes unused tokens past their expiry.
  purgeExpired(): number {
    const result = this.db.prepare(`
      DELETE FROM email_verifications WHERE verified_at IS NULL AND expires_at <= ?
    `).run(new Date(this.clock()).toISOString());
    return result.changes;
  }

  private buildMessage(email: string, token: string) {
    const verifyUrl = `${this.options.appUrl.replace(/\/+$/, '')}/verify-email?token=${encodeURIComponent(token)}`;
    const expiresIn = `${this.options.ttlHours} hours`;

    return {
      to: email,
      subject: 'Verify your email',
      text: [
        'Please confirm your email address by opening the link below.',
        '',
        verifyUrl,
        '',
        `This link will expire in ${expiresIn}. If you did not request this, you can ignore this email.`,
      ].join('\n'),
      html: `<p>Please confirm your email address.</p>
<p><a href="${verifyUrl}">Verify Email</a></p>
<p>This link will expire in ${expiresIn}. If you did not request this, you can ignore this email.</p>`,
    };
  }
}
