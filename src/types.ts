export interface TokenContext {
  ipAddress?: string | null;
}

/**
 * Issues a credential for `identifier` (an email address) and delivers it.
 * May fail transiently; a ValidationError means the request can never succeed.
 */
export interface TokenIssuer {
  createToken(userId: string, identifier: string, context: TokenContext): Promise<string>;
}

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<{ messageId: string }>;
}

export interface AuditEntry {
  id: string;
  action: string;
  context: Record<string, unknown>;
  createdAt: string;
}

export interface AuditSink {
  record(action: string, context: Record<string, unknown>): void;
}
