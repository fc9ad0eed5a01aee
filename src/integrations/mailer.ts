import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { MailMessage, Mailer } from '../types.js';

export interface MailerConfig {
  smtpUrl?: string;
  from: string;
}

export class SmtpMailer implements Mailer {
  constructor(
    private readonly transporter: Transporter,
    private readonly from: string,
    private readonly logger: Logger = createLogger('Mailer')
  ) {}

  async send(message: MailMessage): Promise<{ messageId: string }> {
    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });

      this.logger.info('Mail sent', { to: message.to, subject: message.subject });
      return { messageId: String(info.messageId ?? '') };
    } catch (error) {
      this.logger.error('Mail send error', { to: message.to, error });
      throw error;
    }
  }
}

// Without SMTP_URL, messages are rendered by nodemailer's JSON transport and
// only logged, so development setups never need a mail server.
export function createMailer(config: MailerConfig, logger?: Logger): Mailer {
  const transporter = config.smtpUrl
    ? nodemailer.createTransport(config.smtpUrl)
    : nodemailer.createTransport({ jsonTransport: true });

  return new SmtpMailer(transporter, config.from, logger);
}
