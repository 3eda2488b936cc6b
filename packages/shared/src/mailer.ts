import { type Mailer } from '@contacts/domain';
import { createLogger, type SafeLogger } from './logger';

const POSTMARK_API_URL = 'https://api.postmarkapp.com/email';

export interface PostmarkEmail {
  From: string;
  To: string;
  Subject: string;
  HtmlBody: string;
  TextBody: string;
  MessageStream?: string;
}

export interface PostmarkMailerConfig {
  serverToken?: string;
  from: string;
  fromName: string;
  logger?: SafeLogger;
  fetchFn?: typeof fetch;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderConfirmationEmail(username: string, link: string): { html: string; text: string } {
  const safeName = escapeHtml(username);
  const safeLink = escapeHtml(link);
  return {
    html:
      `<p>Hi ${safeName},</p>` +
      `<p>Thanks for signing up. Please confirm your email address:</p>` +
      `<p><a href="${safeLink}">Confirm email</a></p>` +
      `<p>If you did not create an account, you can ignore this message.</p>`,
    text: `Hi ${username},\n\nConfirm your email address: ${link}\n`,
  };
}

export function renderPasswordResetEmail(link: string): { html: string; text: string } {
  const safeLink = escapeHtml(link);
  return {
    html:
      `<p>We received a request to reset your password.</p>` +
      `<p><a href="${safeLink}">Reset password</a></p>` +
      `<p>If you did not ask for this, you can ignore this message.</p>`,
    text: `Reset your password: ${link}\n`,
  };
}

/**
 * Transactional mail through the Postmark HTTP API. Without a server token
 * messages are logged and dropped, which keeps local setups working.
 */
export class PostmarkMailer implements Mailer {
  private readonly logger: SafeLogger;
  private readonly fetchFn: typeof fetch;
  private readonly sender: string;

  constructor(private readonly config: PostmarkMailerConfig) {
    this.logger = config.logger ?? createLogger({ name: 'mailer' });
    this.fetchFn = config.fetchFn ?? fetch;
    this.sender = `${config.fromName} <${config.from}>`;
  }

  async sendEmailConfirmation(input: { to: string; username: string; link: string }): Promise<void> {
    const body = renderConfirmationEmail(input.username, input.link);
    await this.send({
      From: this.sender,
      To: input.to,
      Subject: 'Confirm your email',
      HtmlBody: body.html,
      TextBody: body.text,
    });
  }

  async sendPasswordReset(input: { to: string; link: string }): Promise<void> {
    const body = renderPasswordResetEmail(input.link);
    await this.send({
      From: this.sender,
      To: input.to,
      Subject: 'Password reset request',
      HtmlBody: body.html,
      TextBody: body.text,
    });
  }

  private async send(email: PostmarkEmail): Promise<void> {
    const token = this.config.serverToken?.trim();
    if (!token) {
      this.logger.warn({ subject: email.Subject }, 'POSTMARK_SERVER_TOKEN not set, email skipped');
      return;
    }

    const res = await this.fetchFn(POSTMARK_API_URL, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'X-Postmark-Server-Token': token,
      },
      body: JSON.stringify(email),
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new Error(`Postmark send failed (${res.status}): ${detail || res.statusText}`);
    }

    this.logger.info({ subject: email.Subject }, 'Email sent');
  }
}
